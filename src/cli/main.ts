#!/usr/bin/env node

/**
 * flowshot CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerCaptureCommand, registerPlanCommand } from './run.js';

const program = new Command();

program
  .name('flowshot')
  .description(
    'Drive a browser through a natural-language task and capture every distinct UI state as a screenshot dataset.',
  )
  .version('0.1.0');

registerCaptureCommand(program);
registerPlanCommand(program);

await program.parseAsync();
