export type ErrorCode =
  | 'profile-not-found'
  | 'profile-running'
  | 'config-missing'
  | 'invalid-config'
  | 'executable-not-found'
  | 'duplicate-name'
  | 'artifact-exists'
  | 'port-out-of-range'
  | 'port-contended'
  | 'port-busy'
  | 'limit-reached'
  | 'launch-failed';

export class ManagerError extends Error {
  constructor(public readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProfileNotFoundError extends ManagerError {
  constructor(name: string) {
    super('profile-not-found', `Profile '${name}' not found`);
  }
}

export class ProfileRunningError extends ManagerError {
  constructor(name: string, message = `Profile '${name}' is running; disconnect it first`) {
    super('profile-running', message);
  }
}

export class ConfigMissingError extends ManagerError {
  constructor(name: string, path: string) {
    super('config-missing', `Config file for '${name}' does not exist: ${path}`);
  }
}

export class InvalidConfigError extends ManagerError {
  constructor(message: string) {
    super('invalid-config', message);
  }
}

export class ExecutableNotFoundError extends ManagerError {
  constructor() {
    super('executable-not-found', 'wireproxy executable not found; set it with `wpm path <exe>`');
  }
}

export class DuplicateNameError extends ManagerError {
  constructor(name: string) {
    super('duplicate-name', `Profile '${name}' already exists`);
  }
}

export class ArtifactExistsError extends ManagerError {
  constructor(path: string) {
    super('artifact-exists', `A file already exists at ${path}`);
  }
}

export class PortOutOfRangeError extends ManagerError {
  constructor(port: number, start: number, end: number) {
    super('port-out-of-range', `Port ${port} is outside the allowed range ${start}-${end}`);
  }
}

export class PortContendedError extends ManagerError {
  constructor(port: number, public readonly holder: string) {
    super('port-contended', `Port ${port} is used by profile '${holder}'`);
  }
}

export class PortBusyError extends ManagerError {
  constructor(message: string) {
    super('port-busy', message);
  }
}

export class LimitReachedError extends ManagerError {
  constructor(limit: number) {
    super('limit-reached', `Connection limit of ${limit} reached; no free port in range`);
  }
}

export class LaunchError extends ManagerError {
  constructor(message: string, public readonly exitCode: number | null = null) {
    super('launch-failed', message);
  }
}

export function isManagerError(err: unknown): err is ManagerError {
  return err instanceof ManagerError;
}
