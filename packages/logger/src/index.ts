import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'autodeploy' },
  redact: {
    paths: ['token', 'password', 'credentials.token', 'headers.authorization'],
    censor: '***'
  }
});
