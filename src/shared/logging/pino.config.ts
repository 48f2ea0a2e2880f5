import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

function requestIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  return 'id' in req && typeof req.id === 'string' ? req.id : undefined;
}

const serviceName = process.env.SERVICE_NAME || 'memoire-rag-backend';
const logDir = process.env.LOG_DIR;

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
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
  ];

  // JSON file sink only when a log directory is configured
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
      ],
      remove: true,
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

    genReqId: (req: IncomingMessage) => requestIdOf(req) ?? `req-${uuidv4()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req),
    }),

    stream: multistream(buildStreams()),
  },
};
