/**
 * ProcessSupervisor: launches, probes and terminates wireproxy processes.
 *
 * Each connect writes a fresh launch config bound to 127.0.0.1:<port>, spawns
 * `<exe> -c <launch config>` detached, and treats an exit inside the grace
 * interval as a launch failure.
 */

import { ChildProcess, spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { Profile, ProxyType } from '../types';
import { errorMessage, log } from '../logger';
import { ProcessBackend, selectBackend } from './backend';

export const LAUNCH_CONFIG_SUFFIX = '_wireproxy.conf';

export type StartFailureReason = 'spawn-failed' | 'exited';

export type StartResult =
  | { ok: true; pid: number }
  | { ok: false; reason: StartFailureReason; exitCode: number | null; message: string };

export interface LaunchSettings {
  executable: string;
  proxyType: ProxyType;
  loggingEnabled: boolean;
}

/** What the manager needs from a supervisor; tests provide fakes. */
export interface ProcessControl {
  start(profile: Profile, port: number, settings: LaunchSettings): Promise<StartResult>;
  isRunning(pid: number | null | undefined): boolean;
  stop(pid: number | null | undefined): Promise<void>;
  removeLaunchConfig(profileName: string): void;
}

export interface SupervisorOptions {
  profilesDir: string;
  logsDir: string;
  launchGraceMs: number;
  stopTimeoutMs: number;
  profileLogMaxBytes: number;
  profileLogBackups: number;
  backend?: ProcessBackend;
}

type EarlyExit = { reason: StartFailureReason; exitCode: number | null; message: string };

const POLL_INTERVAL_MS = 50;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function safeLogName(name: string): string {
  return Array.from(name).filter((c) => /[A-Za-z0-9_-]/.test(c)).join('');
}

export function renderLaunchConfig(sourcePath: string, port: number, proxyType: ProxyType): string {
  const section = proxyType === 'http' ? 'http' : 'Socks5';
  return `WGConfig = "${sourcePath}"\n\n[${section}]\nBindAddress = 127.0.0.1:${port}\n`;
}

export class ProcessSupervisor implements ProcessControl {
  private readonly backend: ProcessBackend;

  constructor(private readonly options: SupervisorOptions) {
    this.backend = options.backend ?? selectBackend();
  }

  launchConfigPath(profileName: string): string {
    return path.join(this.options.profilesDir, `${profileName}${LAUNCH_CONFIG_SUFFIX}`);
  }

  logPath(profileName: string): string {
    return path.join(this.options.logsDir, `wireproxy_${safeLogName(profileName)}.log`);
  }

  generateLaunchConfig(sourcePath: string, port: number, proxyType: ProxyType, outputPath: string): void {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, renderLaunchConfig(path.resolve(sourcePath), port, proxyType), 'utf8');
    log.debug('Generated launch config', { port, proxyType, outputPath });
  }

  removeLaunchConfig(profileName: string): void {
    fs.rmSync(this.launchConfigPath(profileName), { force: true });
  }

  /** Shift `<log>` to `<log>.1`, `.1` to `.2`... once it passes the size cap. */
  rotateLog(logPath: string): void {
    const { profileLogMaxBytes: maxBytes, profileLogBackups: backups } = this.options;
    try {
      if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= maxBytes) {
        return;
      }
      if (backups === 0) {
        fs.rmSync(logPath, { force: true });
        return;
      }
      for (let i = backups - 1; i >= 1; i--) {
        const src = `${logPath}.${i}`;
        if (fs.existsSync(src)) {
          fs.renameSync(src, `${logPath}.${i + 1}`);
        }
      }
      fs.renameSync(logPath, `${logPath}.1`);
    } catch (err) {
      log.error('Failed to rotate profile log', { logPath, error: errorMessage(err) });
    }
  }

  async start(profile: Profile, port: number, settings: LaunchSettings): Promise<StartResult> {
    const launchPath = this.launchConfigPath(profile.name);
    this.generateLaunchConfig(profile.confPath, port, settings.proxyType, launchPath);

    let output: number | 'ignore' = 'ignore';
    let child: ChildProcess;
    try {
      if (settings.loggingEnabled) {
        const logPath = this.logPath(profile.name);
        fs.mkdirSync(this.options.logsDir, { recursive: true });
        this.rotateLog(logPath);
        output = fs.openSync(logPath, 'a');
        fs.writeSync(output, `\n=== Launching wireproxy at ${new Date().toString()} ===\n`);
        fs.writeSync(output, `Cmd: ${settings.executable} -c ${launchPath}\n`);
      }

      child = spawn(settings.executable, ['-c', launchPath], {
        detached: true,
        stdio: ['ignore', output, output],
        windowsHide: true
      });
    } catch (err) {
      log.error(`Failed to start wireproxy for '${profile.name}'`, { error: errorMessage(err) });
      return { ok: false, reason: 'spawn-failed', exitCode: null, message: errorMessage(err) };
    } finally {
      if (typeof output === 'number') fs.closeSync(output);
    }

    child.on('error', (err) => {
      log.error(`wireproxy process error for '${profile.name}'`, { error: err.message });
    });

    const early = await this.waitForEarlyExit(child);
    if (early) {
      log.error(`wireproxy exited immediately for '${profile.name}'`, {
        exitCode: early.exitCode,
        log: this.logPath(profile.name)
      });
      return { ok: false, ...early };
    }

    if (child.pid === undefined) {
      return { ok: false, reason: 'spawn-failed', exitCode: null, message: 'Process has no pid' };
    }

    child.unref();
    log.process('wireproxy started', { pid: child.pid, profile: profile.name, port });
    return { ok: true, pid: child.pid };
  }

  isRunning(pid: number | null | undefined): boolean {
    if (pid === null || pid === undefined) return false;
    return this.backend.isAlive(pid);
  }

  /** Terminate `pid` and its descendants. Already-exited processes are a no-op. */
  async stop(pid: number | null | undefined): Promise<void> {
    if (pid === null || pid === undefined || !this.isRunning(pid)) {
      return;
    }

    log.process('Stopping wireproxy', { pid });
    if (!(await this.backend.terminateTree(pid, false))) {
      this.backend.kill(pid);
    }
    if (await this.waitForExit(pid)) {
      return;
    }

    log.warn('Process ignored termination, killing', { pid });
    if (!(await this.backend.terminateTree(pid, true))) {
      this.backend.kill(pid);
    }
    if (!(await this.waitForExit(pid))) {
      throw new Error(`Process ${pid} is still running after kill`);
    }
  }

  private async waitForExit(pid: number): Promise<boolean> {
    const deadline = Date.now() + this.options.stopTimeoutMs;
    while (this.backend.isAlive(pid)) {
      if (Date.now() >= deadline) return false;
      await delay(POLL_INTERVAL_MS);
    }
    return true;
  }

  private waitForEarlyExit(child: ChildProcess): Promise<EarlyExit | null> {
    return new Promise((resolve) => {
      const cleanup = () => {
        clearTimeout(timer);
        child.off('exit', onExit);
        child.off('error', onError);
      };
      const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
        cleanup();
        resolve({
          reason: 'exited',
          exitCode: code,
          message: `wireproxy exited immediately with ${code !== null ? `code ${code}` : `signal ${signal}`}`
        });
      };
      const onError = (err: Error) => {
        cleanup();
        resolve({ reason: 'spawn-failed', exitCode: null, message: err.message });
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(null);
      }, this.options.launchGraceMs);

      child.once('exit', onExit);
      child.once('error', onError);
    });
  }
}
