/**
 * ProfileStore: the single in-memory collection of profiles.
 *
 * Reads refresh `running` from process liveness: a recorded pid is never
 * trusted until it has been probed.
 */

import { Profile, ProxyType } from '../types';
import { DuplicateNameError, ProfileNotFoundError } from '../errors';
import { LivenessCheck } from '../ports/registry';

/** Moves the backing config for a rename; returns the new config path. */
export type RelocateFn = (profile: Profile, newName: string) => string;

export class ProfileStore {
  private profiles: Profile[] = [];
  private readonly launching = new Set<Profile>();

  constructor(private readonly isAlive: LivenessCheck) {}

  replaceAll(profiles: readonly Profile[]): void {
    const seen = new Set<string>();
    this.profiles = [];
    for (const profile of profiles) {
      if (seen.has(profile.name)) continue;
      seen.add(profile.name);
      this.profiles.push(profile);
    }
  }

  /**
   * Liveness-refreshed view. Profiles whose process has died are moved to
   * stopped; those are returned so callers can persist or announce them.
   */
  refresh(): Profile[] {
    return this.profiles.filter((profile) => this.refreshOne(profile));
  }

  private refreshOne(profile: Profile): boolean {
    if (profile.pid !== undefined && !this.isAlive(profile.pid)) {
      this.markStopped(profile);
      return true;
    }
    profile.running = profile.pid !== undefined;
    return false;
  }

  list(): Profile[] {
    this.refresh();
    return [...this.profiles];
  }

  /** Current records without a liveness pass. */
  snapshot(): readonly Profile[] {
    return this.profiles;
  }

  get size(): number {
    return this.profiles.length;
  }

  has(name: string): boolean {
    return this.profiles.some((p) => p.name === name);
  }

  findByName(name: string): Profile | undefined {
    const profile = this.profiles.find((p) => p.name === name);
    if (profile) {
      this.refreshOne(profile);
    }
    return profile;
  }

  get(name: string): Profile {
    const profile = this.findByName(name);
    if (!profile) throw new ProfileNotFoundError(name);
    return profile;
  }

  findByPort(port: number): Profile | undefined {
    return this.list().find((p) => p.running && p.proxyPort === port);
  }

  running(): Profile[] {
    return this.list().filter((p) => p.running);
  }

  indexOf(name: string): number {
    return this.profiles.findIndex((p) => p.name === name);
  }

  add(profile: Profile): void {
    if (this.has(profile.name)) {
      throw new DuplicateNameError(profile.name);
    }
    this.profiles.push(profile);
  }

  remove(name: string): Profile | undefined {
    const index = this.indexOf(name);
    if (index < 0) return undefined;
    const [removed] = this.profiles.splice(index, 1);
    return removed;
  }

  rename(oldName: string, newName: string, relocate?: RelocateFn): Profile {
    const profile = this.get(oldName);
    if (oldName === newName) {
      return profile;
    }
    if (this.has(newName)) {
      throw new DuplicateNameError(newName);
    }

    const confPath = relocate ? relocate(profile, newName) : profile.confPath;
    profile.name = newName;
    profile.confPath = confPath;
    profile.hostCache = undefined;
    return profile;
  }

  /** Claim a profile for a launch; false when one is already in flight. */
  beginLaunch(profile: Profile): boolean {
    if (this.launching.has(profile)) return false;
    this.launching.add(profile);
    return true;
  }

  endLaunch(profile: Profile): void {
    this.launching.delete(profile);
  }

  isLaunching(profile: Profile): boolean {
    return this.launching.has(profile);
  }

  markStarted(profile: Profile, pid: number, port: number, proxyType: ProxyType): void {
    profile.pid = pid;
    profile.proxyPort = port;
    profile.lastPort = port;
    profile.proxyType = proxyType;
    profile.running = true;
  }

  markStopped(profile: Profile): void {
    if (profile.proxyPort !== undefined) {
      profile.lastPort = profile.proxyPort;
    }
    profile.pid = undefined;
    profile.proxyPort = undefined;
    profile.proxyType = undefined;
    profile.running = false;
  }
}
