// Config Model - fixed slots held in memory by ConfigStore

import { ConfigKey } from '../../../constants';

export type ConfigEntries = Record<ConfigKey, string>;
