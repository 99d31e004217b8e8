import pino from 'pino';

export const logger = pino({
  name: 'storefront-ledger',
  level: process.env['LOG_LEVEL'] || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export type Logger = typeof logger;
