import { pino } from 'pino';
import { config } from './config.js';

const logger = pino({
  level: config.logLevel,
  base: { service: 'vidya-bot' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
