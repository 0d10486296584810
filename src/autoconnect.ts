/**
 * AutoConnectOrchestrator: connects many stopped profiles at once.
 *
 * A bounded pool of async workers drains a FIFO queue. Host probes and
 * launches run concurrently; the "locked" sections are synchronous blocks
 * with no await, which the event loop runs atomically. Workers claim ports
 * in the registry's reservation set, shared with single connects, so no two
 * launches can bind the same port even when both probed it as free.
 */

import { Profile, PortRange, ProxyType } from './types';
import { AutoConnectProgress, AutoConnectSummary, ManagerEvents } from './events';
import { PortOutOfRangeError } from './errors';
import { errorMessage, log } from './logger';
import { PortRegistry } from './ports/registry';
import { ProfileStore } from './profiles/store';
import { StartResult } from './process/supervisor';

export interface Launcher {
  proxyType: ProxyType;
  launch(profile: Profile, port: number): Promise<StartResult>;
}

export interface AutoConnectOptions {
  /** Subset by name; all profiles when omitted */
  names?: string[];
  /** Start from this profile and continue to the end of the list */
  from?: string;
  /** Sequential mode: hand out ports in queue order starting here */
  startPort?: number;
  signal?: AbortSignal;
}

export interface AutoConnectDeps {
  store: ProfileStore;
  registry: PortRegistry;
  events: ManagerEvents;
  portLimit: () => number;
  sourceExists: (profile: Profile) => boolean;
  /** Called after a profile's runtime fields are updated */
  onStarted?: (profile: Profile) => void;
}

export interface AutoConnectTuning {
  workers: number;
  pauseMs: number;
}

interface RunContext {
  queue: Profile[];
  limit: number;
  range: PortRange;
  sequential: boolean;
  nextPort: number;
  attempted: number;
  total: number;
  launcher: Launcher;
  /** Ports this run holds in the registry */
  reserved: Set<number>;
  signal?: AbortSignal;
  summary: AutoConnectSummary;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class AutoConnectOrchestrator {
  private active = false;
  private current: Promise<AutoConnectSummary | null> | null = null;
  private readonly profiles = (): readonly Profile[] => this.deps.store.snapshot();

  constructor(
    private readonly deps: AutoConnectDeps,
    private readonly tuning: AutoConnectTuning
  ) {}

  isRunning(): boolean {
    return this.active;
  }

  /**
   * Fire a run in the background. Returns false when a run is already active.
   * Failures are logged; observers follow progress through events.
   */
  start(options: AutoConnectOptions, launcher: Launcher): boolean {
    if (this.active) {
      log.warn('Auto-connect is already running');
      return false;
    }
    this.current = this.run(options, launcher).catch((err: unknown) => {
      log.error('Auto-connect failed', { error: errorMessage(err) });
      return null;
    });
    return true;
  }

  /** Resolves once the active run, if any, has finished. */
  async whenIdle(): Promise<void> {
    if (this.current) {
      await this.current;
    }
  }

  /** Run to completion. Resolves to null when another run is active. */
  async run(options: AutoConnectOptions, launcher: Launcher): Promise<AutoConnectSummary | null> {
    if (this.active) {
      log.warn('Auto-connect is already running');
      return null;
    }

    const limit = this.deps.portLimit();
    const range = this.deps.registry.allowedRange(limit);
    if (options.startPort !== undefined && !this.deps.registry.isInAllowedRange(options.startPort, limit)) {
      throw new PortOutOfRangeError(options.startPort, range.start, range.end);
    }

    this.active = true;
    const summary: AutoConnectSummary = { queued: 0, started: [], failed: [], skipped: [], cancelled: false };
    const reserved = new Set<number>();

    try {
      const queue = this.buildQueue(options);
      summary.queued = queue.length;
      if (queue.length === 0) {
        return summary;
      }

      const ctx: RunContext = {
        queue,
        limit,
        range,
        sequential: options.startPort !== undefined,
        nextPort: options.startPort ?? range.start,
        attempted: 0,
        total: queue.length,
        launcher,
        reserved,
        signal: options.signal,
        summary
      };

      const workers = Math.min(this.tuning.workers, queue.length);
      log.autoConnect('Starting', { queued: queue.length, workers, limit });

      const results = await Promise.allSettled(
        Array.from({ length: workers }, (_, id) => this.worker(ctx, id))
      );
      for (const result of results) {
        if (result.status === 'rejected') {
          log.error('Auto-connect worker crashed', { error: errorMessage(result.reason) });
        }
      }

      summary.skipped.push(...ctx.queue.map((p) => p.name));
      return summary;
    } finally {
      for (const port of reserved) {
        this.deps.registry.release(port);
      }
      this.active = false;
      log.autoConnect('Finished', {
        started: summary.started.length,
        failed: summary.failed.length,
        skipped: summary.skipped.length
      });
      this.deps.events.emit({ type: 'autoconnect:finished', summary });
    }
  }

  private buildQueue(options: AutoConnectOptions): Profile[] {
    let candidates = this.deps.store.list();

    if (options.from !== undefined) {
      const index = candidates.findIndex((p) => p.name === options.from);
      candidates = index < 0 ? [] : candidates.slice(index);
    }
    if (options.names !== undefined) {
      const wanted = options.names;
      candidates = wanted
        .map((name) => candidates.find((p) => p.name === name))
        .filter((p): p is Profile => p !== undefined);
    }

    return candidates.filter((p) => !p.running && this.deps.sourceExists(p));
  }

  private portsInUse(): Set<number> {
    return this.deps.registry.portsInUse(this.profiles());
  }

  private async worker(ctx: RunContext, id: number): Promise<void> {
    for (;;) {
      // -- locked: limit check and pop
      if (ctx.signal?.aborted) {
        ctx.summary.cancelled = true;
        return;
      }
      if (ctx.limit > 0 && this.portsInUse().size >= ctx.limit) {
        log.autoConnect('Limit reached', { worker: id, limit: ctx.limit });
        return;
      }
      const profile = ctx.queue.shift();
      if (!profile) {
        return;
      }
      // -- unlocked

      let progress: AutoConnectProgress;
      try {
        progress = await this.connectOne(ctx, profile);
      } catch (err) {
        log.error(`Auto-connect failed for '${profile.name}'`, { error: errorMessage(err) });
        progress = { name: profile.name, ok: false, error: errorMessage(err), attempted: 0, total: ctx.total };
      }

      ctx.attempted++;
      progress.attempted = ctx.attempted;
      (progress.ok ? ctx.summary.started : ctx.summary.failed).push(profile.name);
      this.deps.events.emit({ type: 'autoconnect:progress', progress });

      if (this.tuning.pauseMs > 0) {
        await delay(this.tuning.pauseMs);
      }
    }
  }

  private async connectOne(ctx: RunContext, profile: Profile): Promise<AutoConnectProgress> {
    const base = { name: profile.name, attempted: 0, total: ctx.total };

    if (!this.deps.store.snapshot().includes(profile)) {
      return { ...base, ok: false, error: 'Profile was removed' };
    }
    if (this.deps.store.findByName(profile.name)?.running) {
      return { ...base, ok: false, error: 'Already running' };
    }
    if (!this.deps.store.beginLaunch(profile)) {
      return { ...base, ok: false, error: 'Already connecting' };
    }

    try {
      const port = await this.findAndReserve(ctx, profile);
      if (port === null) {
        log.autoConnect(`No port available for '${profile.name}'`);
        return { ...base, ok: false, error: 'No free port available' };
      }
      ctx.reserved.add(port);

      try {
        const result = await ctx.launcher.launch(profile, port);
        if (!result.ok) {
          return { ...base, ok: false, port, error: result.message };
        }
        // Fields are complete before the reservation is released below
        this.deps.store.markStarted(profile, result.pid, port, ctx.launcher.proxyType);
        this.deps.onStarted?.(profile);
        this.deps.events.emit({ type: 'profile:started', name: profile.name, port, pid: result.pid });
        return { ...base, ok: true, port };
      } finally {
        this.deps.registry.release(port);
        ctx.reserved.delete(port);
      }
    } finally {
      this.deps.store.endLaunch(profile);
    }
  }

  private async findAndReserve(ctx: RunContext, profile: Profile): Promise<number | null> {
    if (!ctx.sequential) {
      return this.deps.registry.pickPortForProfile(profile, this.profiles, ctx.limit);
    }

    let busy = 0;
    while (ctx.nextPort <= ctx.range.end && busy < this.deps.registry.maxBusyProbes) {
      const port = ctx.nextPort++;
      const outcome = await this.deps.registry.tryReserve(port, this.profiles);
      if (outcome === 'reserved') return port;
      if (outcome === 'busy') busy++;
    }
    return null;
  }
}
