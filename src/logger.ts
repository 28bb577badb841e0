import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

const logger = winston.createLogger({
  level: ['error', 'warn', 'info', 'debug'].includes(level) ? level : 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'jira-component-sync' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

export function createLogger(source: string): winston.Logger {
  return logger.child({ source });
}

export function setLogLevel(next: string): void {
  logger.level = next;
}

export default logger;
