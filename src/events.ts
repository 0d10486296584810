/**
 * Typed manager events consumed by the CLI and the REST event stream.
 */

import { EventEmitter } from 'events';

export interface AutoConnectProgress {
  name: string;
  ok: boolean;
  port?: number;
  error?: string;
  attempted: number;
  total: number;
}

export interface AutoConnectSummary {
  queued: number;
  started: string[];
  failed: string[];
  skipped: string[];
  cancelled: boolean;
}

export type ManagerEvent =
  | { type: 'profile:added'; name: string }
  | { type: 'profile:removed'; name: string }
  | { type: 'profile:renamed'; from: string; to: string }
  | { type: 'profile:started'; name: string; port: number; pid: number }
  | { type: 'profile:stopped'; name: string; port?: number; reason: 'disconnect' | 'exited' | 'override' | 'shutdown' | 'deleted' }
  | { type: 'autoconnect:progress'; progress: AutoConnectProgress }
  | { type: 'autoconnect:finished'; summary: AutoConnectSummary };

export type ManagerEventType = ManagerEvent['type'];

export type ManagerEventOf<T extends ManagerEventType> = Extract<ManagerEvent, { type: T }>;

export type ManagerListener = (event: ManagerEvent) => void;

export class ManagerEvents {
  private readonly emitter = new EventEmitter();

  constructor() {
    // SSE clients subscribe one listener each
    this.emitter.setMaxListeners(0);
  }

  on<T extends ManagerEventType>(type: T, listener: (event: ManagerEventOf<T>) => void): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  /** Every event, in emission order. */
  onAny(listener: ManagerListener): () => void {
    this.emitter.on('*', listener);
    return () => this.emitter.off('*', listener);
  }

  emit(event: ManagerEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }
}
