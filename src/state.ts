import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GlobalConfig, Profile, PROXY_TYPES } from './types';
import { errorMessage, log } from './logger';

export const STATE_VERSION = 3;

const ProfileRecordSchema = z.object({
  name: z.string().min(1),
  confPath: z.string(),
  proxyPort: z.number().int().nullish(),
  lastPort: z.number().int().nullish(),
  pid: z.number().int().nullish(),
  proxyType: z.enum(['socks', 'http']).nullish(),
  running: z.boolean().optional()
});

const StateFileSchema = z.object({
  version: z.number().int(),
  portLimit: z.number().int().min(0).default(10),
  proxyType: z.enum(['socks', 'http']).default('socks'),
  wireproxyPath: z.string().nullable().default(null),
  loggingEnabled: z.boolean().default(true),
  profiles: z.array(ProfileRecordSchema).default([])
});

type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

export interface PersistedState {
  settings: GlobalConfig;
  profiles: Profile[];
}

/** Load/save seam used by the manager; tests can swap in memory. */
export interface StatePersistence {
  load(): PersistedState;
  save(state: PersistedState): void;
}

export function defaultSettings(): GlobalConfig {
  return { portLimit: 10, proxyType: 'socks', wireproxyPath: null, loggingEnabled: true };
}

export function defaultState(): PersistedState {
  return { settings: defaultSettings(), profiles: [] };
}

/** Fixed-shape profile record with every optional field explicit. */
export function createProfile(name: string, confPath: string, fields: Partial<Profile> = {}): Profile {
  return {
    name,
    confPath,
    proxyPort: fields.proxyPort,
    lastPort: fields.lastPort,
    pid: fields.pid,
    proxyType: fields.proxyType,
    running: fields.running ?? false,
    hostCache: undefined
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const LEGACY_KEYS: Record<string, string> = {
  port_limit: 'portLimit',
  proxy_type: 'proxyType',
  wireproxy_path: 'wireproxyPath',
  logging_enabled: 'loggingEnabled',
  conf_path: 'confPath',
  proxy_port: 'proxyPort',
  last_port: 'lastPort'
};

function renameLegacyKeys(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const mapped = LEGACY_KEYS[key] ?? key;
    if (!(mapped in out)) out[mapped] = value;
  }
  return out;
}

function backupSuffix(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Upgrade an older state document step by step.
 * v1 is the baseline, v2 introduced proxyType, v3 introduced loggingEnabled.
 */
export function migrateState(data: Record<string, unknown>): Record<string, unknown> {
  const migrated = renameLegacyKeys(data);
  if (Array.isArray(migrated.profiles)) {
    migrated.profiles = migrated.profiles.map((p) => (isRecord(p) ? renameLegacyKeys(p) : p));
  }

  let current = typeof migrated.version === 'number' ? migrated.version : 0;
  while (current < STATE_VERSION) {
    if (current < 1) {
      current = 1;
    } else if (current < 2) {
      if (typeof migrated.proxyType !== 'string') migrated.proxyType = 'socks';
      current = 2;
    } else {
      if (typeof migrated.loggingEnabled !== 'boolean') migrated.loggingEnabled = true;
      current = 3;
    }
  }

  if (typeof migrated.proxyType === 'string') {
    const lowered = migrated.proxyType.toLowerCase();
    migrated.proxyType = PROXY_TYPES.some((t) => t === lowered) ? lowered : 'socks';
  }

  migrated.version = STATE_VERSION;
  return migrated;
}

function toProfile(record: ProfileRecord): Profile {
  return createProfile(record.name, record.confPath, {
    proxyPort: record.proxyPort ?? undefined,
    lastPort: record.lastPort ?? undefined,
    pid: record.pid ?? undefined,
    proxyType: record.proxyType ?? undefined,
    running: record.running ?? false
  });
}

function toRecord(profile: Profile): ProfileRecord {
  return {
    name: profile.name,
    confPath: profile.confPath,
    proxyPort: profile.proxyPort ?? null,
    lastPort: profile.lastPort ?? null,
    pid: profile.pid ?? null,
    proxyType: profile.proxyType ?? null,
    running: profile.running
  };
}

export class StateStore implements StatePersistence {
  constructor(private readonly statePath: string) {
    const dir = path.dirname(this.statePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  load(): PersistedState {
    if (!fs.existsSync(this.statePath)) {
      return defaultState();
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.statePath, 'utf8'));
    } catch (err) {
      log.warn(`Could not read ${this.statePath}, using default state`, { error: errorMessage(err) });
      return defaultState();
    }

    if (!isRecord(data)) {
      log.warn(`${this.statePath} is not an object, using default state`);
      return defaultState();
    }

    const version = typeof data.version === 'number' ? data.version : 0;
    if (version < STATE_VERSION) {
      log.state('Migrating old state file', { from: version, to: STATE_VERSION });
      this.backup();
      data = migrateState(data);
    }

    const parsed = StateFileSchema.safeParse(data);
    if (!parsed.success) {
      log.warn(`Invalid state in ${this.statePath}, using default state`, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      });
      return defaultState();
    }

    const { profiles, version: _version, ...settings } = parsed.data;
    log.state('State loaded', {
      portLimit: settings.portLimit,
      proxyType: settings.proxyType,
      profiles: profiles.length
    });

    if (version < STATE_VERSION) {
      this.save({ settings, profiles: profiles.map(toProfile) });
    }

    return { settings, profiles: profiles.map(toProfile) };
  }

  save(state: PersistedState): void {
    const document = {
      version: STATE_VERSION,
      ...state.settings,
      profiles: state.profiles.map(toRecord)
    };
    fs.writeFileSync(this.statePath, JSON.stringify(document, null, 2));
  }

  private backup(): void {
    try {
      fs.copyFileSync(this.statePath, `${this.statePath}.bak-${backupSuffix(new Date())}`);
    } catch (err) {
      log.error('Failed to back up state before migration', { error: errorMessage(err) });
    }
  }
}
