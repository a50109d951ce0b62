/**
 * Tests for the file runner.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { checkFiles, defaultConcurrency, formatFiles, formatStream } from '../../../../src/core/runner/runner.js';
import { ErrorCodes, ParseError, SystemError } from '../../../../src/utils/errors.js';

describe('runner', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'sexpfmt-runner-'));
    await writeFile(join(cwd, 'bad.scm'), '(a');
    await writeFile(join(cwd, 'good.scm'), '(a b)\n');
    await writeFile(join(cwd, 'messy.scm'), '(a   b)');
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  describe('formatFiles', () => {
    it('should rewrite only files that change', async () => {
      const summary = await formatFiles(['bad.scm', 'good.scm', 'messy.scm'], { cwd, concurrency: 2 });

      expect(summary.results.map((r) => [r.file, r.status])).toEqual([
        ['bad.scm', 'error'],
        ['good.scm', 'unchanged'],
        ['messy.scm', 'formatted'],
      ]);
      expect(summary.total).toBe(3);
      expect(summary.failed).toBe(1);
      expect(await readFile(join(cwd, 'messy.scm'), 'utf-8')).toBe('(a b)\n');
      expect(await readFile(join(cwd, 'bad.scm'), 'utf-8')).toBe('(a');
    });

    it('should report the parse error of a malformed file', async () => {
      const summary = await formatFiles(['bad.scm'], { cwd });

      expect(summary.results[0].error).toBeInstanceOf(ParseError);
      expect(summary.results[0].error?.message).toBe("unclosed '(' at line 1, column 1");
    });

    it('should report a missing file as an error and keep going', async () => {
      const summary = await formatFiles(['missing.scm', 'messy.scm'], { cwd, concurrency: 1 });

      expect(summary.results.map((r) => r.status)).toEqual(['error', 'formatted']);
      expect(summary.results[0].error).toBeInstanceOf(SystemError);
      expect(summary.results[0].error).toMatchObject({ code: ErrorCodes.FILE_READ_ERROR });
      expect(summary.results[0].error?.message).toMatch(/^Failed to read missing\.scm: /);
    });

    it('should pass the width through', async () => {
      await writeFile(join(cwd, 'wide.scm'), '(a b c)\n');

      const summary = await formatFiles(['wide.scm'], { cwd, maxWidth: 5 });

      expect(summary.results[0].status).toBe('formatted');
      expect(await readFile(join(cwd, 'wide.scm'), 'utf-8')).toBe('(a\n  b\n  c)\n');
    });
  });

  describe('checkFiles', () => {
    it('should report verdicts without writing', async () => {
      const summary = await checkFiles(['bad.scm', 'good.scm', 'messy.scm'], { cwd });

      expect(summary.results.map((r) => r.status)).toEqual(['error', 'ok', 'fail']);
      expect(summary.failed).toBe(2);
      expect(await readFile(join(cwd, 'messy.scm'), 'utf-8')).toBe('(a   b)');
    });
  });

  describe('formatStream', () => {
    it('should format text', () => {
      expect(formatStream('(a   b)')).toBe('(a b)\n');
    });

    it('should throw ParseError for malformed text', () => {
      expect(() => formatStream('(a')).toThrow(ParseError);
    });
  });

  describe('defaultConcurrency', () => {
    it('should stay between 2 and 16', () => {
      const concurrency = defaultConcurrency();

      expect(concurrency).toBeGreaterThanOrEqual(2);
      expect(concurrency).toBeLessThanOrEqual(16);
    });
  });
});
