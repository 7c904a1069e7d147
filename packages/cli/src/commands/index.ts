/**
 * @fileoverview Command exports for rowcast CLI.
 *
 * @module commands
 */

export { createCLI, VERSION } from './cli.js';
export { createRenderCommand } from './render.js';
export { createConfigCommand } from './config.js';
