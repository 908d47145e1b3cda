import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig, loggingConfig } from '../connections/config/app.config';

interface LoggerOptions {
  level: string;
  logDir: string;
  fileLogging: boolean;
  silent: boolean;
}

class LoggingConfig {
  private rotation = '10MB';
  private retention = '30d';

  constructor(private readonly options: LoggerOptions) {
    if (options.fileLogging && !fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): { file?: string; line?: number; function?: string } {
    const originalFunc = Error.prepareStackTrace;
    let callerInfo: { file?: string; line?: number; function?: string } = {};

    try {
      Error.prepareStackTrace = (_err, stack) => stack;
      const stack: unknown = new Error().stack;

      if (Array.isArray(stack)) {
        // Skip getCallerInfo and the winston format function
        for (const frame of stack.slice(2) as NodeJS.CallSite[]) {
          const file = frame.getFileName();
          if (file && !file.includes('node_modules') && !file.includes('winston')) {
            callerInfo = {
              file,
              line: frame.getLineNumber() ?? undefined,
              function: frame.getFunctionName() || 'anonymous',
            };
            break;
          }
        }
      }
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    return callerInfo;
  }

  private createFormat(colorize: boolean) {
    const formats = [
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
    ];
    if (colorize) {
      formats.push(winston.format.colorize({ all: true }));
    }

    return winston.format.combine(
      ...formats,
      winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const callerInfo = this.getCallerInfo();
        const location = callerInfo.file && callerInfo.line
          ? ` | ${path.relative(process.cwd(), callerInfo.file)}:${callerInfo.line} (${callerInfo.function})`
          : '';

        const stackStr = typeof stack === 'string' ? `\n${stack}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} | ${level} | ${String(message)}${location}${metaStr}${stackStr}`;
      })
    );
  }

  private createRotatingTransport(name: string, level: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.options.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.rotation,
      maxFiles: this.retention,
      zippedArchive: true,
      level,
      format: this.createFormat(false),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.options.level,
      format: this.createFormat(false),
      transports: [],
      silent: this.options.silent,
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.options.level,
      format: this.createFormat(true),
    }));

    if (this.options.fileLogging) {
      logger.add(this.createRotatingTransport('sys', this.options.level));
      logger.add(this.createRotatingTransport('error', 'error'));
      logger.add(this.createRotatingTransport('combined', 'silly'));
    }

    return logger;
  }
}

const isTest = appConfig.nodeEnv === 'test';

export const logger = new LoggingConfig({
  level: loggingConfig.logLevel,
  logDir: loggingConfig.logDir,
  fileLogging: !isTest,
  silent: isTest,
}).setupLogging();

export { LoggingConfig };
