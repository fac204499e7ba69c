/**
 * writeUpdated / isOutdated tests
 *
 * Uses a fresh temporary directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { writeUpdated, isOutdated } from './write-updated.js';
import { OutputError } from '../errors/roff-error.js';

describe('writeUpdated', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roffsmith-out-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the file and its parent directories', async () => {
    const file = path.join(dir, 'man', 'man1', 'demo.1');
    expect(await writeUpdated(file, '.TH DEMO 1\n')).toBe(true);
    expect(fs.readFileSync(file, 'utf-8')).toBe('.TH DEMO 1\n');
  });

  it('returns false and leaves the file alone when contents match', async () => {
    const file = path.join(dir, 'demo.1');
    fs.writeFileSync(file, '.TH DEMO 1\n');
    const before = fs.statSync(file).mtimeMs;
    expect(await writeUpdated(file, '.TH DEMO 1\n')).toBe(false);
    expect(fs.statSync(file).mtimeMs).toBe(before);
  });

  it('rewrites a file with different contents', async () => {
    const file = path.join(dir, 'demo.1');
    fs.writeFileSync(file, '.TH OLD 1\n.SH NAME\nold text that is longer\n');
    expect(await writeUpdated(file, '.TH NEW 1\n')).toBe(true);
    expect(fs.readFileSync(file, 'utf-8')).toBe('.TH NEW 1\n');
  });

  it('accepts bytes', async () => {
    const file = path.join(dir, 'demo.1');
    expect(await writeUpdated(file, new TextEncoder().encode('bytes\n'))).toBe(true);
    expect(await writeUpdated(file, 'bytes\n')).toBe(false);
  });

  it('treats an empty page as unchanged for a missing file', async () => {
    const file = path.join(dir, 'empty.1');
    expect(await writeUpdated(file, '')).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('wraps read failures in OutputError', async () => {
    await expect(writeUpdated(dir, 'x')).rejects.toBeInstanceOf(OutputError);
    await expect(writeUpdated(dir, 'x')).rejects.toMatchObject({
      code: 'OUTPUT_ERROR',
      context: { path: dir },
    });
  });
});

describe('isOutdated', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roffsmith-check-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file as outdated without creating it', async () => {
    const file = path.join(dir, 'demo.1');
    expect(await isOutdated(file, '.TH DEMO 1\n')).toBe(true);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('reports a matching file as current', async () => {
    const file = path.join(dir, 'demo.1');
    fs.writeFileSync(file, '.TH DEMO 1\n');
    expect(await isOutdated(file, '.TH DEMO 1\n')).toBe(false);
    expect(await isOutdated(file, '.TH DEMO 2\n')).toBe(true);
  });
});
