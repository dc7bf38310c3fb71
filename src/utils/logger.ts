import pino from 'pino';

const serviceName = process.env.OMSTORE_SERVICE_NAME || 'omstore';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') {
    // No transport: JSON lines on stdout
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export function createLogger(): pino.Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: buildTransport(),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        service: serviceName,
      }),
    },
  };

  return pino(config);
}

export const logger = createLogger();
