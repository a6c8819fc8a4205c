#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { registerIngestCommand } from './commands/ingest.js';
import { registerAskCommand } from './commands/ask.js';
import { registerCollectionsCommand } from './commands/collections.js';
import { registerHealthCommand } from './commands/health.js';
import { registerMcpCommand } from './commands/mcp.js';
import { PACKAGE_VERSION } from './version.js';
import { PageWiseError } from '../domain/errors/DomainErrors.js';
import { errorMessage } from '../shared/Logger.js';

const program = new Command();

program
  .name('pagewise')
  .description('Ask questions about a PDF or text document using parent/child chunk retrieval')
  .version(PACKAGE_VERSION);

registerIngestCommand(program);
registerAskCommand(program);
registerCollectionsCommand(program);
registerHealthCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    if (err instanceof PageWiseError) {
      process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
    } else {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
    }
    process.exit(1);
  }
}

void main();
