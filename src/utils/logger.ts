import winston from 'winston';
import { config } from '../config/index.js';
import { getKubeStatusCode } from './kube-errors.js';

const { combine, timestamp, errors, json, printf, colorize } = winston.format;

// Development format: "<time> [level] ns/name: message {meta}"
const devFormat = printf(({ level, message, timestamp, namespace, name, ...metadata }) => {
  const scope = typeof namespace === 'string' && typeof name === 'string' ? ` ${namespace}/${name}` : '';
  let msg = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

const logger = winston.createLogger({
  level: config.operator.logLevel,
  silent: config.isTest,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })),
  defaultMeta: { service: 'searchdb-operator' },
  transports: [
    new winston.transports.Console({
      format: config.isDevelopment ? combine(colorize(), devFormat) : json(),
    }),
  ],
});

export default logger;

/** Logger bound to one SearchDatabase; every line carries its namespace and name. */
export function databaseLogger(namespace: string, name: string): winston.Logger {
  return logger.child({ namespace, name });
}

function describeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const described: Record<string, unknown> = { message: error.message, name: error.name, stack: error.stack };
  const status = getKubeStatusCode(error);
  if (status !== null) described.status = status;
  return described;
}

export function logError(message: string, error: unknown, metadata?: Record<string, unknown>): void {
  logger.error(message, { error: describeError(error), ...metadata });
}

export function logInfo(message: string, metadata?: Record<string, unknown>): void {
  logger.info(message, metadata);
}

export function logDebug(message: string, metadata?: Record<string, unknown>): void {
  logger.debug(message, metadata);
}

export function logWarning(message: string, metadata?: Record<string, unknown>): void {
  logger.warn(message, metadata);
}
