#!/usr/bin/env node

import { logger } from '../shared/logger/pino.js';

import { EXIT_FAILED, userMessage } from './download-command.js';
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error({ error }, 'Command failed');
    process.stderr.write(`${userMessage(error)}\n`);
    process.exitCode = EXIT_FAILED;
  });
