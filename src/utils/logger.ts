import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the enrichment pipeline. Console output is always on;
 * file output under logs/ is enabled with LOG_TO_FILE=true.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function fileTransports() {
  if (process.env.LOG_TO_FILE !== 'true') {
    return [];
  }

  return [
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ReferenceDataStore', 'IndexVerifier')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: [
      // stderr keeps stdout clean for --json output
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
      ...fileTransports(),
    ],
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Helper to log pipeline-run events with a consistent run id
 */
export class RunLogger {
  private logger: winston.Logger;
  private runId: string;

  constructor(runId: string) {
    this.runId = runId;
    this.logger = createLogger(`Run:${runId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { runId: this.runId, ...metadata });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { runId: this.runId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }
}
