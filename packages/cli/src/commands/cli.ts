/**
 * @fileoverview CLI router for rowcast.
 *
 * @module commands/cli
 */

import { Command } from 'commander';
import { createRenderCommand } from './render.js';
import { createConfigCommand } from './config.js';

/**
 * Version reported by `rowcast --version`.
 */
export const VERSION = '0.1.0';

/**
 * Create the main CLI program with all subcommands.
 *
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command()
    .name('rowcast')
    .description('rowcast - render record files as JSON or CSV')
    .version(VERSION);

  program.addCommand(createRenderCommand());
  program.addCommand(createConfigCommand());

  return program;
}
