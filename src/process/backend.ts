/**
 * Platform process backends. Liveness and tree termination differ between
 * POSIX and Windows; everything above this file works with plain pids.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage, log } from '../logger';

const execFileAsync = promisify(execFile);

export interface ProcessBackend {
  readonly platform: 'posix' | 'win32';
  /** Non-destructive liveness probe. */
  isAlive(pid: number): boolean;
  /** Terminate the process and its descendants. Resolves false when unavailable. */
  terminateTree(pid: number, force: boolean): Promise<boolean>;
  /** Forceful single-process kill. An already-exited process is not an error. */
  kill(pid: number): void;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Signal 0 checks existence without delivering anything, on both platforms. */
export function probeAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but owned by someone else
    return errnoCode(err) === 'EPERM';
  }
}

export class PosixBackend implements ProcessBackend {
  readonly platform = 'posix' as const;

  isAlive(pid: number): boolean {
    return probeAlive(pid);
  }

  async terminateTree(pid: number, force: boolean): Promise<boolean> {
    // Launched detached, so the pid leads its own process group
    try {
      process.kill(-pid, force ? 'SIGKILL' : 'SIGTERM');
      return true;
    } catch (err) {
      log.debug('Process group signal failed', { pid, error: errorMessage(err) });
      return false;
    }
  }

  kill(pid: number): void {
    try {
      process.kill(pid, 'SIGKILL');
    } catch (err) {
      if (errnoCode(err) !== 'ESRCH') throw err;
    }
  }
}

export class Win32Backend implements ProcessBackend {
  readonly platform = 'win32' as const;

  isAlive(pid: number): boolean {
    return probeAlive(pid);
  }

  async terminateTree(pid: number, _force: boolean): Promise<boolean> {
    try {
      await execFileAsync('taskkill', ['/PID', String(pid), '/T', '/F'], { windowsHide: true });
      log.process('Terminated process tree with taskkill', { pid });
      return true;
    } catch (err) {
      log.warn('taskkill failed, falling back to single-process kill', { pid, error: errorMessage(err) });
      return false;
    }
  }

  kill(pid: number): void {
    try {
      process.kill(pid);
    } catch (err) {
      if (errnoCode(err) !== 'ESRCH') throw err;
    }
  }
}

export function selectBackend(platform: NodeJS.Platform = process.platform): ProcessBackend {
  return platform === 'win32' ? new Win32Backend() : new PosixBackend();
}
