#!/usr/bin/env tsx
import { Command } from 'commander';
import { askCommand } from '../src/commands/ask.js';
import { maintainCommand } from '../src/commands/maintain.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('steward')
  .description('Steward - personal assistant with Git-backed memory')
  .version('0.1.0');

program.addCommand(askCommand);
program.addCommand(maintainCommand);
program.addCommand(configCommand);

await program.parseAsync();
