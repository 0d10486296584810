import * as dotenv from 'dotenv';
import { Config } from './types';

dotenv.config();

export const config: Config = {
  portRangeStart: parseInt(process.env.PORT_RANGE_START || '60000', 10),
  portRangeEnd: parseInt(process.env.PORT_RANGE_END || '65535', 10),
  statePath: process.env.STATE_PATH || './state.json',
  profilesDir: process.env.PROFILES_DIR || './profiles',
  logsDir: process.env.LOGS_DIR || './logs',
  launchGraceMs: parseInt(process.env.LAUNCH_GRACE_MS || '250', 10),
  probeTimeoutMs: parseInt(process.env.PROBE_TIMEOUT_MS || '300', 10),
  stopTimeoutMs: parseInt(process.env.STOP_TIMEOUT_MS || '3000', 10),
  autoConnectWorkers: parseInt(process.env.AUTO_CONNECT_WORKERS || '4', 10),
  autoConnectPauseMs: parseInt(process.env.AUTO_CONNECT_PAUSE_MS || '100', 10),
  maxBusyProbes: parseInt(process.env.MAX_BUSY_PROBES || '64', 10),
  profileLogMaxBytes: parseInt(process.env.PROFILE_LOG_MAX_BYTES || '2000000', 10),
  profileLogBackups: parseInt(process.env.PROFILE_LOG_BACKUPS || '2', 10),
  exitIpCheckUrl: process.env.EXIT_IP_CHECK_URL || 'https://ifconfig.io',
  restEnabled: process.env.REST_ENABLED === 'true',
  restPort: parseInt(process.env.REST_PORT || '8080', 10),
  logLevel: process.env.LOG_LEVEL || 'info',
  logFile: process.env.LOG_FILE || undefined
};

export function validateConfig(cfg: Config = config): void {
  const isPort = (n: number) => Number.isInteger(n) && n >= 1 && n <= 65535;

  if (!isPort(cfg.portRangeStart) || !isPort(cfg.portRangeEnd)) {
    throw new Error('PORT_RANGE_START and PORT_RANGE_END must be ports between 1 and 65535');
  }

  if (cfg.portRangeStart > cfg.portRangeEnd) {
    throw new Error('PORT_RANGE_START must not be greater than PORT_RANGE_END');
  }

  const positive: Array<[string, number]> = [
    ['AUTO_CONNECT_WORKERS', cfg.autoConnectWorkers],
    ['PROBE_TIMEOUT_MS', cfg.probeTimeoutMs],
    ['STOP_TIMEOUT_MS', cfg.stopTimeoutMs],
    ['MAX_BUSY_PROBES', cfg.maxBusyProbes]
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['LAUNCH_GRACE_MS', cfg.launchGraceMs],
    ['AUTO_CONNECT_PAUSE_MS', cfg.autoConnectPauseMs],
    ['PROFILE_LOG_MAX_BYTES', cfg.profileLogMaxBytes],
    ['PROFILE_LOG_BACKUPS', cfg.profileLogBackups]
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${name} must be a non-negative integer`);
    }
  }

  if (cfg.restEnabled && !isPort(cfg.restPort)) {
    throw new Error('REST_PORT must be a port between 1 and 65535');
  }
}
