#!/usr/bin/env node
/**
 * modgraph CLI Entry Point
 */

import { reportCommandError } from '../commands/index.js';
import { createProgram } from '../program.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    reportCommandError(error);
  }
}

await main();
