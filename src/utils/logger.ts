/**
 * Structured logger (pino)
 */

import pino from 'pino';
import { config } from '../config/index.js';

function createDestination(): pino.DestinationStream {
  const streams: pino.StreamEntry[] = [{ stream: process.stdout }];

  if (config.logging.file) {
    streams.push({
      stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
    });
  }

  return pino.multistream(streams);
}

export const logger = pino(
  {
    name: config.app.name,
    level: config.app.env === 'test' ? 'silent' : config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    // Call sites log failures under `error`, not pino's default `err`
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  createDestination()
);

export type Logger = typeof logger;
