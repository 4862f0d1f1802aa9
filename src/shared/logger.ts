import pino from 'pino';

// stdout belongs to the printed command and the generator's own output; logs go to fd 2.
export const logger = pino(
  {
    name: 'gen-api',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination({ dest: 2, sync: true })
);
