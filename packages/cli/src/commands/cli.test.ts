/**
 * @fileoverview Tests for CLI router.
 *
 * @module commands/cli.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Command } from 'commander';
import { createCLI, VERSION } from './cli.js';

// Mock the subcommand modules to avoid their side effects
vi.mock('./render.js', () => ({
  createRenderCommand: vi.fn(() => new Command('render').description('Render records')),
}));

vi.mock('./config.js', () => ({
  createConfigCommand: vi.fn(() => new Command('config').description('View config')),
}));

import { createRenderCommand } from './render.js';
import { createConfigCommand } from './config.js';

describe('createCLI', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should be named "rowcast"', () => {
    const cli = createCLI();
    expect(cli.name()).toBe('rowcast');
  });

  it('should report the package version', () => {
    const cli = createCLI();
    expect(cli.version()).toBe(VERSION);
    expect(VERSION).toBe('0.1.0');
  });

  it('should add render and config commands', () => {
    const cli = createCLI();

    expect(createRenderCommand).toHaveBeenCalledTimes(1);
    expect(createConfigCommand).toHaveBeenCalledTimes(1);
    expect(cli.commands.map((cmd) => cmd.name())).toEqual(['render', 'config']);
  });
});
