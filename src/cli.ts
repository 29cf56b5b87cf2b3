#!/usr/bin/env node
/**
 * CLI Entry
 *
 * Usage: pulsewatch [config.json]
 */

import { main } from './main';
import { errorMessage } from './utils';

try {
  main();
} catch (error) {
  process.stderr.write(`pulsewatch: ${errorMessage(error)}\n`);
  process.exitCode = 1;
}
