import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';

function requestIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' ? header : undefined;
}

const serviceName = process.env.SERVICE_NAME || 'passage-qa';
const logDir = process.env.LOG_DIR;

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: requestIdOf(req),
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '') === '/health',
    },

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req),
    }),

    // Pretty console outside production, plus JSON lines when LOG_DIR is set
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      ...(logDir
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(join(logDir, `${serviceName}.log`), {
                flags: 'a',
              }),
            },
          ]
        : []),
    ]),
  },
};
