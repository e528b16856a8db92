import winston from 'winston';
import fs from 'fs';
import { config } from './config.js';

function consoleTransport(stderrLevels: string[] = []): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({
    stderrLevels,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message }) => {
        return `${timestamp} [${level}]: ${message}`;
      })
    ),
  });
}

const consoleOutput = consoleTransport();

const transports: Array<
  winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
> = [consoleOutput];

// Ensure data directory exists before the file transport opens its stream
if (!config.logging.silent) {
  if (!fs.existsSync(config.paths.dataDir)) {
    fs.mkdirSync(config.paths.dataDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: config.paths.logFile,
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
  ),
  transports,
});

/** Send console output to stderr, for commands whose stdout carries a protocol. */
export function logToStderr(): void {
  logger.remove(consoleOutput);
  logger.add(consoleTransport(Object.keys(logger.levels)));
}
