import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Profile } from "../types";
import { ManagerEvent } from "../events";
import { PersistedState, StatePersistence, defaultState } from "../state";
import { ProfileSources } from "../profiles/sources";
import { LaunchSettings, ProcessControl, StartResult } from "../process/supervisor";
import { ManagerConfig, ProfileManager } from "../manager";

export const RANGE_START = 61000;
export const RANGE_END = 61999;

export const WIREGUARD_CONF = [
  "[Interface]",
  "PrivateKey = test-private-key",
  "Address = 10.0.0.2/32",
  "",
  "[Peer]",
  "PublicKey = test-public-key",
  "Endpoint = vpn.example.com:51820",
  "AllowedIPs = 0.0.0.0/0",
  "",
].join("\n");

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function makeTempDir(prefix = "wpm-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * In-process stand-in for the machine: live pids, bound ports and ports
 * held by processes the manager does not know about.
 */
export class FakeHost implements ProcessControl {
  readonly alive = new Set<number>();
  readonly bound = new Map<number, number>();
  readonly externallyBusy = new Set<number>();
  readonly failing = new Set<string>();
  readonly starts: Array<{ name: string; port: number; settings: LaunchSettings }> = [];
  readonly removedLaunchConfigs: string[] = [];
  readonly probed: number[] = [];
  probeDelayMs = 0;
  launchDelayMs = 0;
  private nextPid = 1000;

  probe = async (port: number): Promise<boolean> => {
    this.probed.push(port);
    if (this.probeDelayMs > 0) await delay(this.probeDelayMs);
    return !this.externallyBusy.has(port) && !this.bound.has(port);
  };

  async start(profile: Profile, port: number, settings: LaunchSettings): Promise<StartResult> {
    this.starts.push({ name: profile.name, port, settings });
    if (this.launchDelayMs > 0) await delay(this.launchDelayMs);

    if (this.failing.has(profile.name)) {
      return { ok: false, reason: "exited", exitCode: 1, message: "wireproxy exited immediately with code 1" };
    }
    if (this.bound.has(port) || this.externallyBusy.has(port)) {
      return { ok: false, reason: "exited", exitCode: 1, message: `address 127.0.0.1:${port} already in use` };
    }

    const pid = this.nextPid++;
    this.alive.add(pid);
    this.bound.set(port, pid);
    return { ok: true, pid };
  }

  isRunning(pid: number | null | undefined): boolean {
    return pid !== null && pid !== undefined && this.alive.has(pid);
  }

  async stop(pid: number | null | undefined): Promise<void> {
    if (pid === null || pid === undefined) return;
    this.crash(pid);
  }

  removeLaunchConfig(profileName: string): void {
    this.removedLaunchConfigs.push(profileName);
  }

  /** Simulate a process dying on its own. */
  crash(pid: number): void {
    this.alive.delete(pid);
    for (const [port, holder] of this.bound) {
      if (holder === pid) this.bound.delete(port);
    }
  }
}

export class MemoryPersistence implements StatePersistence {
  saves = 0;

  constructor(private state: PersistedState = defaultState()) {}

  load(): PersistedState {
    return {
      settings: { ...this.state.settings },
      profiles: this.state.profiles.map((p) => ({ ...p })),
    };
  }

  save(state: PersistedState): void {
    this.saves++;
    this.state = {
      settings: { ...state.settings },
      profiles: state.profiles.map((p) => ({ ...p, hostCache: undefined })),
    };
  }

  get current(): PersistedState {
    return this.state;
  }
}

export interface TestManagerOptions {
  profiles?: string[];
  portLimit?: number;
  workers?: number;
  executable?: string | null;
}

export interface TestManager {
  manager: ProfileManager;
  host: FakeHost;
  persistence: MemoryPersistence;
  profilesDir: string;
  events: ManagerEvent[];
}

export function createTestManager(options: TestManagerOptions = {}): TestManager {
  const profilesDir = makeTempDir();
  for (const name of options.profiles ?? ["alpha", "bravo", "charlie"]) {
    fs.writeFileSync(path.join(profilesDir, `${name}.conf`), WIREGUARD_CONF);
  }

  const host = new FakeHost();
  const state = defaultState();
  state.settings.portLimit = options.portLimit ?? 10;
  const persistence = new MemoryPersistence(state);
  const executable = options.executable === undefined ? "/usr/local/bin/wireproxy" : options.executable;

  const config: ManagerConfig = {
    portRangeStart: RANGE_START,
    portRangeEnd: RANGE_END,
    autoConnectWorkers: options.workers ?? 4,
    autoConnectPauseMs: 0,
    maxBusyProbes: 64,
  };

  const manager = new ProfileManager({
    config,
    persistence,
    sources: new ProfileSources(profilesDir),
    processes: host,
    probe: host.probe,
    locateExecutable: async () => executable,
  });
  manager.init();

  const events: ManagerEvent[] = [];
  manager.events.onAny((event) => events.push(event));

  return { manager, host, persistence, profilesDir, events };
}

export function runningPorts(manager: ProfileManager): number[] {
  return manager
    .list()
    .filter((p) => p.running)
    .map((p) => p.proxyPort)
    .filter((port): port is number => port !== null)
    .sort((a, b) => a - b);
}
