#!/usr/bin/env node
import { createProgram } from './cli.js';
import * as logger from './utils/logger.js';
import { errorMessage } from '../core/utils/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exit(1);
  });
