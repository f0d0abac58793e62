import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { ConfigLoader } from './configLoader';

const logsDir = './logs';
const isTest = process.env.NODE_ENV === 'test';

const configLoader = ConfigLoader.getInstance();
const serverConfig = configLoader.getServerConfig();

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ level, message, timestamp }) => {
        return `${timestamp} ${level}: ${message}`;
      })
    ),
  }),
];

if (!isTest) {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log')
    })
  );
}

const logger = winston.createLogger({
  level: serverConfig.logLevel || 'info',
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'llhls-live-buffer' },
  transports,
});

export function reloadLoggerConfig(): void {
  const refreshedConfig = configLoader.reloadConfig();
  const logLevel = refreshedConfig.server.logLevel || 'info';

  logger.level = logLevel;
  logger.info(`Logger configuration reloaded. Log level set to: ${logLevel}`);
}

export default logger;
