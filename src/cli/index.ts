#!/usr/bin/env node
/**
 * sluice CLI - run the ingestion service or a single ingestion attempt.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { startCommand } from './commands/start';
import { ingestCommand } from './commands/ingest';
import { adaptersCommand } from './commands/adapters';

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8')));

const program = new Command();

program
  .name('sluice')
  .description('sluice - resilient ingestion orchestrator')
  .version(pkg.version);

program.addCommand(startCommand);
program.addCommand(ingestCommand);
program.addCommand(adaptersCommand);

program.parse();
