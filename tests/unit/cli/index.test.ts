/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should be named sexpfmt', () => {
    expect(createCli().name()).toBe('sexpfmt');
  });

  it('should report the package version', () => {
    const manifest: unknown = JSON.parse(readFileSync(join(process.cwd(), 'package.json'), 'utf-8'));

    expect(manifest).toMatchObject({ version: createCli().version() });
  });

  it('should register format as its command', () => {
    expect(createCli().commands.map((c) => c.name())).toEqual(['format']);
  });
});
