#!/usr/bin/env tsx
import { createProgram } from '../cli';
import { logger } from '../logger';

createProgram()
  .parseAsync()
  .catch((error) => {
    logger.error({ err: error }, 'Fatal error');
    process.exit(1);
  });
