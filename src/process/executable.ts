import { execFile } from 'child_process';
import * as fs from 'fs';
import { promisify } from 'util';
import { log } from '../logger';

const execFileAsync = promisify(execFile);

const CANDIDATES = ['wireproxy', 'wireproxy.exe'];

/** Look a command up on PATH with `which` (or `where` on Windows). */
export async function findOnPath(command: string, platform: NodeJS.Platform = process.platform): Promise<string | null> {
  const finder = platform === 'win32' ? 'where' : 'which';
  try {
    const { stdout } = await execFileAsync(finder, [command], { timeout: 5_000, windowsHide: true });
    const first = stdout.split(/\r?\n/).map((line) => line.trim()).find((line) => line.length > 0);
    return first && fs.existsSync(first) ? first : null;
  } catch {
    // Not found
    return null;
  }
}

/**
 * Resolve the wireproxy executable: the configured path when it exists,
 * otherwise the first candidate found on PATH.
 */
export async function locateExecutable(configured: string | null): Promise<string | null> {
  if (configured && fs.existsSync(configured)) {
    return configured;
  }

  for (const candidate of CANDIDATES) {
    const found = await findOnPath(candidate);
    if (found) {
      log.process('Found wireproxy on PATH', { path: found });
      return found;
    }
  }
  return null;
}
