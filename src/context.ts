import { Config } from './types';
import { config } from './config';
import { StateStore } from './state';
import { createPortProbe } from './ports/probe';
import { ProfileSources } from './profiles/sources';
import { ProcessSupervisor } from './process/supervisor';
import { locateExecutable } from './process/executable';
import { ProfileManager } from './manager';

/** Wire a manager to the real filesystem, host ports and processes, then load state. */
export function createManager(cfg: Config = config): ProfileManager {
  const manager = new ProfileManager({
    config: cfg,
    persistence: new StateStore(cfg.statePath),
    sources: new ProfileSources(cfg.profilesDir),
    processes: new ProcessSupervisor({
      profilesDir: cfg.profilesDir,
      logsDir: cfg.logsDir,
      launchGraceMs: cfg.launchGraceMs,
      stopTimeoutMs: cfg.stopTimeoutMs,
      profileLogMaxBytes: cfg.profileLogMaxBytes,
      profileLogBackups: cfg.profileLogBackups
    }),
    probe: createPortProbe(cfg.probeTimeoutMs),
    locateExecutable
  });
  manager.init();
  return manager;
}
