#!/usr/bin/env node
/**
 * gating-rl CLI
 *
 * Train and inspect linear Q-learning agents on memory-augmented environments.
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { inspectCommand } from './commands/inspect.js';
import { trainCommand } from './commands/train.js';

config();

const program = new Command();

program
  .name('gating-rl')
  .description('Reinforcement learning with gated working memory')
  .version('0.1.0');

program.addCommand(trainCommand);
program.addCommand(inspectCommand);

program.parse();
