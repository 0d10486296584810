/**
 * ProfileManager: single-operation entry points over the store, port
 * registry and supervisor. The CLI and the REST API both go through here.
 */

import * as fs from 'fs';
import { Config, ConnectOptions, GlobalConfig, Profile, ProfileView, PortRange, PROXY_TYPES } from './types';
import { AutoConnectSummary, ManagerEvents } from './events';
import {
  ConfigMissingError,
  DuplicateNameError,
  ExecutableNotFoundError,
  InvalidConfigError,
  LaunchError,
  LimitReachedError,
  PortBusyError,
  PortContendedError,
  PortOutOfRangeError,
  ProfileRunningError
} from './errors';
import { log, setLoggingEnabled } from './logger';
import { StatePersistence } from './state';
import { PortRegistry } from './ports/registry';
import { PortProbe } from './ports/probe';
import { ProfileStore } from './profiles/store';
import { ProfileSources, assertProfileName } from './profiles/sources';
import { LaunchSettings, ProcessControl } from './process/supervisor';
import { AutoConnectOptions, AutoConnectOrchestrator, Launcher } from './autoconnect';

export type ManagerConfig = Pick<
  Config,
  'portRangeStart' | 'portRangeEnd' | 'autoConnectWorkers' | 'autoConnectPauseMs' | 'maxBusyProbes'
>;

export interface ManagerDeps {
  config: ManagerConfig;
  persistence: StatePersistence;
  sources: ProfileSources;
  processes: ProcessControl;
  probe: PortProbe;
  locateExecutable: (configured: string | null) => Promise<string | null>;
  events?: ManagerEvents;
}

export interface ConnectResult {
  name: string;
  port: number;
  pid: number;
}

export interface ManagerStatus {
  total: number;
  running: number;
  portLimit: number;
  allowedRange: PortRange;
  proxyType: GlobalConfig['proxyType'];
  autoConnectRunning: boolean;
}

const connectingError = (name: string) =>
  new ProfileRunningError(name, `Profile '${name}' is connecting; try again once it settles`);

export class ProfileManager {
  readonly events: ManagerEvents;
  readonly store: ProfileStore;
  readonly registry: PortRegistry;
  private readonly autoConnector: AutoConnectOrchestrator;
  private settings: GlobalConfig = { portLimit: 10, proxyType: 'socks', wireproxyPath: null, loggingEnabled: true };
  private readonly profiles = (): readonly Profile[] => this.store.snapshot();

  constructor(private readonly deps: ManagerDeps) {
    this.events = deps.events ?? new ManagerEvents();
    const isAlive = (pid: number | undefined) => deps.processes.isRunning(pid);
    this.store = new ProfileStore(isAlive);
    this.registry = new PortRegistry({
      range: { start: deps.config.portRangeStart, end: deps.config.portRangeEnd },
      probe: deps.probe,
      isAlive,
      maxBusyProbes: deps.config.maxBusyProbes
    });
    this.autoConnector = new AutoConnectOrchestrator(
      {
        store: this.store,
        registry: this.registry,
        events: this.events,
        portLimit: () => this.settings.portLimit,
        sourceExists: (p) => deps.sources.exists(p),
        onStarted: () => this.save()
      },
      {
        workers: deps.config.autoConnectWorkers,
        pauseMs: deps.config.autoConnectPauseMs
      }
    );
  }

  /** Load state, pick up new .conf files, drop dead pids and stale launch configs. */
  init(): void {
    const state = this.deps.persistence.load();
    this.settings = state.settings;
    setLoggingEnabled(this.settings.loggingEnabled);
    this.store.replaceAll(state.profiles);

    const known = new Set(this.store.snapshot().map((p) => p.name));
    for (const profile of this.deps.sources.discover(known)) {
      this.store.add(profile);
    }

    for (const profile of this.store.refresh()) {
      log.profile(`Process for '${profile.name}' is gone, marking stopped`);
    }
    const running = new Set(this.store.running().map((p) => p.name));
    this.deps.sources.cleanupLaunchConfigs(running);
    this.save();
  }

  save(): void {
    this.deps.persistence.save({ settings: this.settings, profiles: [...this.store.snapshot()] });
  }

  /** Refresh liveness; announce and persist profiles whose process died. */
  reconcile(): Profile[] {
    const died = this.store.refresh();
    for (const profile of died) {
      this.deps.processes.removeLaunchConfig(profile.name);
      this.events.emit({ type: 'profile:stopped', name: profile.name, port: profile.lastPort, reason: 'exited' });
    }
    if (died.length > 0) this.save();
    return died;
  }

  list(): ProfileView[] {
    this.reconcile();
    return this.store.list().map((p) => this.view(p));
  }

  view(profile: Profile): ProfileView {
    return {
      name: profile.name,
      confPath: profile.confPath,
      running: profile.running,
      proxyPort: profile.proxyPort ?? null,
      lastPort: profile.lastPort ?? null,
      pid: profile.pid ?? null,
      host: this.deps.sources.endpointHost(profile)
    };
  }

  get(name: string): Profile {
    return this.store.get(name);
  }

  getSettings(): GlobalConfig {
    return { ...this.settings };
  }

  updateSettings(patch: Partial<GlobalConfig>): GlobalConfig {
    const next = { ...this.settings, ...patch };
    if (!Number.isInteger(next.portLimit) || next.portLimit < 0) {
      throw new InvalidConfigError('Port limit must be a non-negative integer');
    }
    if (!PROXY_TYPES.includes(next.proxyType)) {
      throw new InvalidConfigError(`Proxy type must be one of: ${PROXY_TYPES.join(', ')}`);
    }
    if (patch.wireproxyPath && !fs.existsSync(patch.wireproxyPath)) {
      throw new InvalidConfigError(`Executable not found: ${patch.wireproxyPath}`);
    }
    this.settings = next;
    setLoggingEnabled(next.loggingEnabled);
    this.save();
    return this.getSettings();
  }

  status(): ManagerStatus {
    const profiles = this.store.list();
    return {
      total: profiles.length,
      running: profiles.filter((p) => p.running).length,
      portLimit: this.settings.portLimit,
      allowedRange: this.registry.allowedRange(this.settings.portLimit),
      proxyType: this.settings.proxyType,
      autoConnectRunning: this.autoConnector.isRunning()
    };
  }

  availablePorts(max = 50): number[] {
    return this.registry.availablePortsQuick(this.store.list(), this.settings.portLimit, max);
  }

  /** Executable path, persisted once found on PATH. Required before any launch. */
  async resolveExecutable(): Promise<string> {
    const found = await this.deps.locateExecutable(this.settings.wireproxyPath);
    if (!found) {
      throw new ExecutableNotFoundError();
    }
    if (found !== this.settings.wireproxyPath) {
      this.settings.wireproxyPath = found;
      this.save();
    }
    return found;
  }

  private launcher(executable: string): Launcher {
    const settings: LaunchSettings = {
      executable,
      proxyType: this.settings.proxyType,
      loggingEnabled: this.settings.loggingEnabled
    };
    return {
      proxyType: settings.proxyType,
      launch: (profile, port) => this.deps.processes.start(profile, port, settings)
    };
  }

  /** Refuse edits to a profile that is running or has a launch in flight. */
  private assertIdle(profile: Profile): void {
    if (this.store.isLaunching(profile)) {
      throw connectingError(profile.name);
    }
    if (profile.running) {
      throw new ProfileRunningError(profile.name);
    }
  }

  async connect(name: string, options: ConnectOptions = {}): Promise<ConnectResult> {
    const profile = this.store.get(name);
    this.assertIdle(profile);
    if (!this.deps.sources.exists(profile)) {
      throw new ConfigMissingError(name, profile.confPath);
    }

    this.store.beginLaunch(profile);
    try {
      const executable = await this.resolveExecutable();
      const port = options.port !== undefined
        ? await this.claimExplicitPort(profile, options.port, options)
        : await this.pickPort(profile);

      try {
        return await this.launchOn(profile, port, this.launcher(executable));
      } finally {
        this.registry.release(port);
      }
    } finally {
      this.store.endLaunch(profile);
    }
  }

  private async launchOn(profile: Profile, port: number, launcher: Launcher): Promise<ConnectResult> {
    const { name } = profile;
    const result = await launcher.launch(profile, port);
    if (!result.ok) {
      this.deps.processes.removeLaunchConfig(name);
      throw new LaunchError(`Failed to start wireproxy for '${name}': ${result.message}`, result.exitCode);
    }

    // Fields are complete before the caller releases the reservation
    this.store.markStarted(profile, result.pid, port, launcher.proxyType);
    this.save();
    log.profile(`Connected '${name}'`, { port, pid: result.pid, limit: this.settings.portLimit });
    this.events.emit({ type: 'profile:started', name, port, pid: result.pid });
    return { name, port, pid: result.pid };
  }

  /** Reserved port for a profile; the caller releases it after the launch. */
  private async pickPort(profile: Profile): Promise<number> {
    const limit = this.settings.portLimit;
    const port = await this.registry.pickPortForProfile(profile, this.profiles, limit);
    if (port !== null) {
      return port;
    }
    if (limit > 0 && this.registry.portsInUse(this.store.list()).size >= limit) {
      throw new LimitReachedError(limit);
    }
    const { start, end } = this.registry.allowedRange(limit);
    throw new PortBusyError(`No free port in ${start}-${end}; every candidate is busy`);
  }

  private async claimExplicitPort(profile: Profile, port: number, options: ConnectOptions): Promise<number> {
    const limit = this.settings.portLimit;
    if (!this.registry.isInAllowedRange(port, limit)) {
      const { start, end } = this.registry.allowedRange(limit);
      throw new PortOutOfRangeError(port, start, end);
    }

    const holder = this.registry.holderOf(port, this.store.list(), profile);
    if (holder) {
      const confirmed = options.confirmOverride ? await options.confirmOverride(holder) : false;
      if (!confirmed) {
        throw new PortContendedError(port, holder.name);
      }
      await this.disconnect(holder.name, 'override');
    }

    const outcome = await this.registry.tryReserve(port, this.profiles);
    if (outcome === 'reserved') {
      return port;
    }
    if (outcome === 'taken') {
      const taker = this.registry.holderOf(port, this.store.snapshot(), profile);
      if (taker) {
        throw new PortContendedError(port, taker.name);
      }
      throw new PortBusyError(`Port ${port} is being claimed by another launch`);
    }
    throw new PortBusyError(
      holder
        ? `Port ${port} is still busy after stopping '${holder.name}'`
        : `Port ${port} is used by another process`
    );
  }

  async disconnect(
    name: string,
    reason: 'disconnect' | 'override' | 'shutdown' | 'deleted' = 'disconnect'
  ): Promise<void> {
    const profile = this.store.get(name);
    const port = profile.proxyPort;
    await this.deps.processes.stop(profile.pid);
    this.store.markStopped(profile);
    this.deps.processes.removeLaunchConfig(profile.name);
    this.save();
    log.profile(`Disconnected '${name}'`, { port, reason });
    this.events.emit({ type: 'profile:stopped', name, port, reason });
  }

  async toggle(name: string, options: ConnectOptions = {}): Promise<ConnectResult | null> {
    if (this.store.get(name).running) {
      await this.disconnect(name);
      return null;
    }
    return this.connect(name, options);
  }

  async delete(name: string): Promise<void> {
    const profile = this.store.get(name);
    if (this.store.isLaunching(profile)) {
      throw connectingError(name);
    }
    if (profile.pid !== undefined) {
      await this.disconnect(name, 'deleted');
    }
    this.deps.sources.delete(profile);
    this.store.remove(name);
    this.save();
    log.profile(`Deleted '${name}'`);
    this.events.emit({ type: 'profile:removed', name });
  }

  /** Rename and/or replace the config text. Refused while running. */
  update(oldName: string, newName: string, content?: string): Profile {
    const profile = this.store.get(oldName);
    this.assertIdle(profile);
    const trimmed = newName.trim();
    if (!trimmed) {
      throw new InvalidConfigError('Profile name cannot be empty');
    }
    if (trimmed !== oldName) {
      assertProfileName(trimmed);
    }

    this.store.rename(oldName, trimmed, (p, next) => this.deps.sources.relocate(p, next));
    if (content !== undefined) {
      this.deps.sources.write(profile, content);
    }
    this.save();

    if (trimmed !== oldName) {
      this.events.emit({ type: 'profile:renamed', from: oldName, to: trimmed });
    }
    return profile;
  }

  readConfig(name: string): string {
    const profile = this.store.get(name);
    if (!this.deps.sources.exists(profile)) {
      throw new ConfigMissingError(name, profile.confPath);
    }
    return this.deps.sources.read(profile);
  }

  importFile(filePath: string): Profile {
    const name = this.deps.sources.nameFromFile(filePath);
    if (this.store.has(name)) {
      throw new DuplicateNameError(name);
    }
    return this.added(this.deps.sources.importFile(filePath));
  }

  importText(nameHint: string, text: string): Profile {
    const taken = new Set(this.store.snapshot().map((p) => p.name));
    return this.added(this.deps.sources.importText(nameHint, text, taken));
  }

  async importUrl(url: string): Promise<Profile> {
    const { nameHint, content } = await this.deps.sources.download(url);
    return this.importText(nameHint, content);
  }

  relink(name: string, replacementPath: string): Profile {
    const profile = this.store.get(name);
    this.deps.sources.relink(profile, replacementPath);
    this.save();
    return profile;
  }

  private added(profile: Profile): Profile {
    this.store.add(profile);
    this.save();
    log.profile(`Imported '${profile.name}'`);
    this.events.emit({ type: 'profile:added', name: profile.name });
    return profile;
  }

  isAutoConnectRunning(): boolean {
    return this.autoConnector.isRunning();
  }

  /** Run auto-connect to completion; null when a run is already active. */
  async autoConnect(options: AutoConnectOptions = {}): Promise<AutoConnectSummary | null> {
    if (this.autoConnector.isRunning()) {
      return null;
    }
    const executable = await this.resolveExecutable();
    return this.autoConnector.run(options, this.launcher(executable));
  }

  /** Start auto-connect in the background; false when a run is already active. */
  async startAutoConnect(options: AutoConnectOptions = {}): Promise<boolean> {
    if (this.autoConnector.isRunning()) {
      return false;
    }
    const executable = await this.resolveExecutable();
    if (options.startPort !== undefined && !this.registry.isInAllowedRange(options.startPort, this.settings.portLimit)) {
      const { start, end } = this.registry.allowedRange(this.settings.portLimit);
      throw new PortOutOfRangeError(options.startPort, start, end);
    }
    return this.autoConnector.start(options, this.launcher(executable));
  }

  whenAutoConnectIdle(): Promise<void> {
    return this.autoConnector.whenIdle();
  }

  /** Stop every running profile and remove generated launch configs. */
  async shutdown(): Promise<void> {
    await this.autoConnector.whenIdle();
    for (const profile of this.store.running()) {
      await this.disconnect(profile.name, 'shutdown');
    }
    this.deps.sources.cleanupLaunchConfigs();
    this.save();
  }
}
