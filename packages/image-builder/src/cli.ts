#!/usr/bin/env tsx

import pino from 'pino';
import { createProgram, describeError } from './program';

const logger = pino({
  name: 'strata',
  level: process.env.STRATA_LOG_LEVEL ?? 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
    },
  },
});

createProgram({
  logger,
  stdout: (text) => {
    process.stdout.write(text);
  },
})
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
  });
