import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { resolveExecutable, splitCandidates } from '../resolve-executable';

let root: string;
let binDir: string;
let emptyDir: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), 'fenprobe-resolve-'));
  binDir = path.join(root, 'bin');
  emptyDir = path.join(root, 'empty');
  await mkdir(binDir);
  await mkdir(emptyDir);
  await mkdir(path.join(binDir, 'engines'));

  await writeFile(path.join(binDir, 'fakefish'), '#!/bin/sh\nexit 0\n');
  await chmod(path.join(binDir, 'fakefish'), 0o755);
  await writeFile(path.join(binDir, 'notes.txt'), 'not an engine\n');
  await chmod(path.join(binDir, 'notes.txt'), 0o644);
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('splitCandidates', () => {
  it('splits on commas and drops blanks', () => {
    expect(splitCandidates(' stockfish , ,./sf,')).toEqual(['stockfish', './sf']);
    expect(splitCandidates('')).toEqual([]);
  });
});

describe('resolveExecutable', () => {
  it('looks bare names up on PATH', async () => {
    const env = { PATH: [emptyDir, binDir].join(path.delimiter) };
    expect(await resolveExecutable(['fakefish'], env, root)).toBe(path.join(binDir, 'fakefish'));
  });

  it('takes names with a separator relative to the working directory', async () => {
    expect(await resolveExecutable(['./fakefish'], { PATH: '' }, binDir)).toBe(path.join(binDir, 'fakefish'));
    expect(await resolveExecutable(['bin/fakefish'], { PATH: '' }, root)).toBe(path.join(binDir, 'fakefish'));
  });

  it('accepts absolute paths', async () => {
    const file = path.join(binDir, 'fakefish');
    expect(await resolveExecutable([file], {}, emptyDir)).toBe(file);
  });

  it('does not search the working directory for bare names', async () => {
    expect(await resolveExecutable(['fakefish'], { PATH: emptyDir }, binDir)).toBeNull();
  });

  it('skips files without the execute bit and directories', async () => {
    const env = { PATH: binDir };
    expect(await resolveExecutable(['notes.txt', 'engines', 'fakefish'], env, root)).toBe(path.join(binDir, 'fakefish'));
  });

  it('returns null when no candidate is usable', async () => {
    expect(await resolveExecutable(['stockfish-missing', './nowhere'], { PATH: binDir }, emptyDir)).toBeNull();
    expect(await resolveExecutable(['fakefish'], {}, root)).toBeNull();
  });
});
