#!/usr/bin/env node

/**
 * xolrisk CLI Entry Point
 */

import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@xolrisk/utils';
import { registerAnalysisCommands } from '../commands/analysis.js';

program
  .name('xolrisk')
  .description('Monte Carlo risk analysis for excess-of-loss reinsurance layers')
  .version('0.1.0');

registerAnalysisCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

program.parseAsync().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exitCode = 1;
});

export { program };
