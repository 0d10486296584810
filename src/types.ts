export type ProxyType = 'socks' | 'http';

export const PROXY_TYPES: readonly ProxyType[] = ['socks', 'http'];

export interface Profile {
  name: string;
  confPath: string;
  proxyPort?: number; // Only while running
  lastPort?: number;
  pid?: number;
  proxyType?: ProxyType; // Mode the process was launched in, only while running
  running: boolean;
  hostCache?: string; // Endpoint host, never persisted
}

export interface GlobalConfig {
  portLimit: number; // 0 = unlimited
  proxyType: ProxyType;
  wireproxyPath: string | null;
  loggingEnabled: boolean;
}

export interface PortRange {
  start: number;
  end: number;
}

export interface Config {
  portRangeStart: number;
  portRangeEnd: number;
  statePath: string;
  profilesDir: string;
  logsDir: string;
  launchGraceMs: number;
  probeTimeoutMs: number;
  stopTimeoutMs: number;
  autoConnectWorkers: number;
  autoConnectPauseMs: number;
  maxBusyProbes: number;
  profileLogMaxBytes: number;
  profileLogBackups: number;
  exitIpCheckUrl: string;
  restEnabled: boolean;
  restPort: number;
  logLevel: string;
  logFile?: string;
}

export interface ConnectOptions {
  port?: number; // Explicit port request
  confirmOverride?: (holder: Profile) => boolean | Promise<boolean>;
}

export interface ProfileView {
  name: string;
  confPath: string;
  running: boolean;
  proxyPort: number | null;
  lastPort: number | null;
  pid: number | null;
  host: string | null;
}
