import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';

/** Split a comma-separated candidate list, dropping blanks. */
export function splitCandidates(list: string): string[] {
  return list
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

async function isExecutableFile(file: string): Promise<boolean> {
  try {
    const info = await stat(file);
    if (!info.isFile()) return false;
    await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the first candidate that names an executable file, the way a shell
 * looks up commands: names with a path separator are taken relative to `cwd`,
 * bare names are looked up on PATH.
 *
 * Returns the absolute path, or null if no candidate is usable.
 */
export async function resolveExecutable(
  candidates: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<string | null> {
  const searchPath = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir.length > 0);

  for (const candidate of candidates) {
    if (candidate.includes('/') || candidate.includes(path.sep)) {
      const file = path.resolve(cwd, candidate);
      if (await isExecutableFile(file)) return file;
      continue;
    }
    for (const dir of searchPath) {
      const file = path.resolve(cwd, dir, candidate);
      if (await isExecutableFile(file)) return file;
    }
  }
  return null;
}
