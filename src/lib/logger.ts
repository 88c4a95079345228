import pino from 'pino';

// stdout belongs to command output, logs go to stderr
const level = process.env.LOG_LEVEL || 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pretty
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2
        }
      }
    })
  : pino({ level }, pino.destination(2));
