/**
 * PortRegistry: decides which local ports a profile may bind.
 *
 * The connection limit is a port-space limit: with `limit > 0` only the first
 * `limit` ports of the base range are allowed. Ports in use are recomputed from
 * process liveness on every call and never cached.
 *
 * Every caller that is about to launch claims its port in the reservation set
 * first. Check and claim are synchronous blocks with no await in between, so
 * two callers that both probed a port as free cannot both take it.
 */

import { Profile, PortRange } from '../types';
import { log } from '../logger';
import { PortProbe } from './probe';

export type LivenessCheck = (pid: number | undefined) => boolean;

/** Current profile records; read again after every probe. */
export type ProfilesView = () => readonly Profile[];

export type ReserveOutcome = 'reserved' | 'taken' | 'busy';

export interface PortRegistryOptions {
  /** Base range, e.g. 60000-65535 */
  range: PortRange;
  probe: PortProbe;
  isAlive: LivenessCheck;
  /** Host-busy ports a single search may hit before giving up */
  maxBusyProbes?: number;
}

export class PortRegistry {
  private readonly base: PortRange;
  private readonly probe: PortProbe;
  private readonly isAlive: LivenessCheck;
  readonly maxBusyProbes: number;
  private readonly reserved = new Set<number>();

  constructor(options: PortRegistryOptions) {
    this.base = { ...options.range };
    this.probe = options.probe;
    this.isAlive = options.isAlive;
    this.maxBusyProbes = options.maxBusyProbes ?? Number.POSITIVE_INFINITY;
  }

  get baseRange(): PortRange {
    return { ...this.base };
  }

  allowedRange(limit: number): PortRange {
    if (limit > 0) {
      return { start: this.base.start, end: Math.min(this.base.start + limit - 1, this.base.end) };
    }
    return { ...this.base };
  }

  isInAllowedRange(port: number, limit: number): boolean {
    const { start, end } = this.allowedRange(limit);
    return Number.isInteger(port) && port >= start && port <= end;
  }

  portsInUse(profiles: readonly Profile[]): Set<number> {
    const used = new Set<number>();
    for (const profile of profiles) {
      if (profile.proxyPort !== undefined && this.isAlive(profile.pid)) {
        used.add(profile.proxyPort);
      }
    }
    return used;
  }

  /** Running profile other than `except` that holds `port`. */
  holderOf(port: number, profiles: readonly Profile[], except?: Profile): Profile | undefined {
    return profiles.find((p) => p !== except && p.proxyPort === port && this.isAlive(p.pid));
  }

  async isPortFreeOnHost(port: number): Promise<boolean> {
    const free = await this.probe(port);
    log.port(`${port} ${free ? 'free' : 'busy'}`);
    return free;
  }

  /** Ports claimed for a launch that has not settled yet. */
  reservedPorts(): ReadonlySet<number> {
    return this.reserved;
  }

  isReserved(port: number): boolean {
    return this.reserved.has(port);
  }

  release(port: number): void {
    this.reserved.delete(port);
  }

  private isTaken(port: number, profiles: readonly Profile[]): boolean {
    return this.reserved.has(port) || this.portsInUse(profiles).has(port);
  }

  /** Check, probe, re-check, claim. A reserved port must be released by the caller. */
  async tryReserve(port: number, profiles: ProfilesView): Promise<ReserveOutcome> {
    if (this.isTaken(port, profiles())) {
      return 'taken';
    }
    if (!(await this.isPortFreeOnHost(port))) {
      return 'busy';
    }
    // -- locked: another caller may have claimed it while we probed
    if (this.isTaken(port, profiles())) {
      return 'taken';
    }
    this.reserved.add(port);
    return 'reserved';
  }

  /**
   * Reserve the lowest free allowed port. Fails fast without probing when
   * the limit is already used up.
   */
  async findFreePort(profiles: ProfilesView, limit: number, exclude?: ReadonlySet<number>): Promise<number | null> {
    if (limit > 0 && this.portsInUse(profiles()).size >= limit) {
      return null;
    }

    const { start, end } = this.allowedRange(limit);
    let busy = 0;
    for (let port = start; port <= end; port++) {
      if (exclude?.has(port)) continue;
      if (busy >= this.maxBusyProbes) {
        log.port(`Gave up after ${busy} busy ports`);
        return null;
      }
      const outcome = await this.tryReserve(port, profiles);
      if (outcome === 'reserved') return port;
      if (outcome === 'busy') busy++;
    }
    return null;
  }

  /** Prefer the profile's previous port so clients pinned to it keep working. */
  async pickPortForProfile(profile: Profile, profiles: ProfilesView, limit: number): Promise<number | null> {
    const preferred = profile.lastPort ?? profile.proxyPort;
    if (preferred === undefined || !this.isInAllowedRange(preferred, limit)) {
      return this.findFreePort(profiles, limit);
    }
    if ((await this.tryReserve(preferred, profiles)) === 'reserved') {
      return preferred;
    }
    return this.findFreePort(profiles, limit, new Set([preferred]));
  }

  /** Allowed ports not held by managed profiles or reservations, without probing the host. */
  availablePortsQuick(profiles: readonly Profile[], limit: number, max = 50): number[] {
    const used = this.portsInUse(profiles);
    const { start, end } = this.allowedRange(limit);
    const ports: number[] = [];
    for (let port = start; port <= end && ports.length < max; port++) {
      if (!used.has(port) && !this.reserved.has(port)) ports.push(port);
    }
    return ports;
  }
}
