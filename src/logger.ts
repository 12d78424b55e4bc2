import winston from 'winston';

const validLogLevels = Object.keys(winston.config.npm.levels);

let logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

if (!validLogLevels.includes(logLevel)) {
  console.warn(`Invalid LOG_LEVEL "${logLevel}" specified. Using "info" instead.`);
  console.warn(`Valid levels are: ${validLogLevels.join(', ')}`);
  logLevel = 'info';
}

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${timestamp}] ${level}: ${message} ${metaStr}`;
  })
);

const logr = winston.createLogger({
  levels: winston.config.npm.levels,
  level: logLevel,
  format: winston.format.errors({ stack: true }),
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

const logger = Object.assign(logr, {
  setLogLevel: (level: string) => {
    const newLevel = level.toLowerCase();
    if (!validLogLevels.includes(newLevel)) {
      logr.warn(`Invalid log level: ${newLevel}. Valid levels are: ${validLogLevels.join(', ')}`);
      return;
    }
    logr.level = newLevel;
    logr.info(`Log level changed to: ${newLevel}`);
  },
});

export default logger;
