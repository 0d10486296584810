/**
 * ProfileSources: owns the WireGuard .conf files in the profiles directory.
 * Import, edit, rename and delete of source configs, plus endpoint parsing.
 */

import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { Profile } from '../types';
import { createProfile } from '../state';
import { ArtifactExistsError, InvalidConfigError } from '../errors';
import { errorMessage, log } from '../logger';
import { LAUNCH_CONFIG_SUFFIX } from '../process/supervisor';

export interface DownloadedConfig {
  nameHint: string;
  content: string;
}

const LAUNCH_NAME_SUFFIX = LAUNCH_CONFIG_SUFFIX.slice(0, -'.conf'.length);
const PROFILE_NAME = /^[A-Za-z0-9_-]+$/;

/** Names whose .conf would be mistaken for a generated launch config. */
export function isLaunchConfigName(name: string): boolean {
  return name.endsWith(LAUNCH_NAME_SUFFIX);
}

export function sanitizeName(hint: string): string {
  let cleaned = Array.from(hint.trim()).filter((c) => /[A-Za-z0-9_-]/.test(c)).join('');
  while (isLaunchConfigName(cleaned)) {
    cleaned = cleaned.slice(0, -LAUNCH_NAME_SUFFIX.length);
  }
  return cleaned || 'imported';
}

/** Names that become files in the profiles directory: `[A-Za-z0-9_-]`, no launch suffix. */
export function assertProfileName(name: string): void {
  if (!PROFILE_NAME.test(name)) {
    throw new InvalidConfigError(`Invalid profile name '${name}': use letters, digits, '_' and '-' only`);
  }
  if (isLaunchConfigName(name)) {
    throw new InvalidConfigError(`Invalid profile name '${name}': names may not end in '${LAUNCH_NAME_SUFFIX}'`);
  }
}

export function looksLikeWireGuardConfig(text: string): boolean {
  return text.includes('[Interface]');
}

/** `Endpoint = host:port` → host. IPv6 endpoints come bracketed. */
export function parseEndpointHost(text: string): string | null {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.toLowerCase().startsWith('endpoint')) continue;

    const eq = line.indexOf('=');
    if (eq < 0) continue;
    let host = line.slice(eq + 1).split('#')[0].split(';')[0].trim();
    if (host.startsWith('[')) {
      host = host.slice(1).split(']')[0];
    } else {
      const colon = host.lastIndexOf(':');
      if (colon >= 0) host = host.slice(0, colon);
    }
    return host || null;
  }
  return null;
}

export class ProfileSources {
  constructor(private readonly profilesDir: string) {
    fs.mkdirSync(this.profilesDir, { recursive: true });
  }

  get directory(): string {
    return this.profilesDir;
  }

  pathFor(name: string): string {
    return path.join(this.profilesDir, `${name}.conf`);
  }

  exists(profile: Profile): boolean {
    return Boolean(profile.confPath) && fs.existsSync(profile.confPath);
  }

  read(profile: Profile): string {
    return fs.readFileSync(profile.confPath, 'utf8');
  }

  /** Source .conf files on disk that are not yet known. */
  discover(known: ReadonlySet<string>): Profile[] {
    const found: Profile[] = [];
    for (const file of fs.readdirSync(this.profilesDir).sort()) {
      if (!file.endsWith('.conf') || file.endsWith(LAUNCH_CONFIG_SUFFIX)) continue;
      const name = path.basename(file, '.conf');
      if (known.has(name)) continue;
      found.push(createProfile(name, path.join(this.profilesDir, file)));
      log.profile('Discovered profile on disk', { name });
    }
    return found;
  }

  /** Copy an external .conf in; caller has already checked the name is free. */
  importFile(filePath: string): Profile {
    const name = this.nameFromFile(filePath);
    if (isLaunchConfigName(name)) {
      throw new InvalidConfigError(`Cannot import ${path.basename(filePath)}: names may not end in '${LAUNCH_NAME_SUFFIX}'`);
    }
    const dest = path.join(this.profilesDir, path.basename(filePath));
    if (fs.existsSync(dest)) {
      throw new ArtifactExistsError(dest);
    }
    fs.copyFileSync(filePath, dest);
    return createProfile(name, dest);
  }

  nameFromFile(filePath: string): string {
    const base = path.basename(filePath);
    return path.basename(base, path.extname(base));
  }

  importText(nameHint: string, text: string, taken: ReadonlySet<string>): Profile {
    if (!text || !looksLikeWireGuardConfig(text)) {
      throw new InvalidConfigError('Text does not look like a WireGuard config');
    }

    const base = sanitizeName(nameHint);
    let name = base;
    for (let i = 1; taken.has(name) || fs.existsSync(this.pathFor(name)); i++) {
      name = `${base}_${i}`;
    }

    const dest = this.pathFor(name);
    fs.writeFileSync(dest, text, 'utf8');
    return createProfile(name, dest);
  }

  async download(url: string, timeoutMs = 15_000): Promise<DownloadedConfig> {
    const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: timeoutMs });
    const contentType = String(response.headers['content-type'] ?? '').toLowerCase();
    if (contentType.startsWith('image/')) {
      throw new InvalidConfigError('URL points to an image; QR codes are not supported');
    }

    const urlPath = new URL(url).pathname;
    const nameHint = path.basename(urlPath, path.extname(urlPath)) || 'downloaded';
    return { nameHint, content: Buffer.from(response.data).toString('utf8') };
  }

  /** Rename the backing file; refuses to overwrite an existing one. */
  relocate(profile: Profile, newName: string): string {
    assertProfileName(newName);
    const newPath = this.pathFor(newName);
    if (fs.existsSync(newPath)) {
      throw new ArtifactExistsError(newPath);
    }
    fs.renameSync(profile.confPath, newPath);
    return newPath;
  }

  write(profile: Profile, content: string): void {
    fs.writeFileSync(profile.confPath, content, 'utf8');
    profile.hostCache = undefined;
  }

  /** Replace a missing source with a copy of `replacementPath`. */
  relink(profile: Profile, replacementPath: string): void {
    const dest = this.pathFor(profile.name);
    fs.copyFileSync(replacementPath, dest);
    profile.confPath = dest;
    profile.hostCache = undefined;
  }

  endpointHost(profile: Profile): string | null {
    if (profile.hostCache) {
      return profile.hostCache;
    }
    if (!this.exists(profile)) {
      return null;
    }
    try {
      const host = parseEndpointHost(this.read(profile));
      if (host) profile.hostCache = host;
      return host;
    } catch (err) {
      log.error(`Failed to parse endpoint from ${profile.confPath}`, { error: errorMessage(err) });
      return null;
    }
  }

  delete(profile: Profile): void {
    for (const file of [profile.confPath, path.join(this.profilesDir, `${profile.name}${LAUNCH_CONFIG_SUFFIX}`)]) {
      try {
        fs.rmSync(file, { force: true });
      } catch (err) {
        log.error(`Failed to delete ${file}`, { error: errorMessage(err) });
      }
    }
  }

  /** Remove generated launch configs, except those of `keep` profiles. */
  cleanupLaunchConfigs(keep: ReadonlySet<string> = new Set()): number {
    let removed = 0;
    for (const file of fs.readdirSync(this.profilesDir)) {
      if (!file.endsWith(LAUNCH_CONFIG_SUFFIX)) continue;
      if (keep.has(file.slice(0, -LAUNCH_CONFIG_SUFFIX.length))) continue;
      fs.rmSync(path.join(this.profilesDir, file), { force: true });
      removed++;
    }
    return removed;
  }
}
