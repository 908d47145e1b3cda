import { Request } from 'express';

/**
 * Auth Request - request that passed the admin token check
 */
export interface AuthRequest extends Request {
  admin?: string;
}
