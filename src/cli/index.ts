#!/usr/bin/env node
import { Command } from 'commander';
import { createDecodeCommand } from './commands/decode.js';
import { createSignaturesCommand } from './commands/signatures.js';

const program = new Command();

program
  .name('log-lens')
  .description('Decode blockchain event logs with a caller-supplied ABI')
  .version('0.1.0');

program.addCommand(createDecodeCommand());
program.addCommand(createSignaturesCommand());

program.parse();
