import { randomUUID } from 'crypto';
import { SessionNotFoundError } from '../../domain/errors';
import { type Logger, silentLogger } from '../logging/logger';
import type { WizardController } from './wizardController';

export interface WizardSessionRecord {
  id: string;
  controller: WizardController;
  createdAt: Date;
  lastSeenAt: Date;
}

export type SessionCloseListener = (record: WizardSessionRecord) => void;

export interface WizardSessionRegistryOptions {
  createController: (sessionId: string) => WizardController;
  ttlMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Keeps one controller per browser client. Sessions live in memory only and
 * expire after `ttlMs` without a request. Listeners registered with `onClose`
 * run once when their session is deleted or expires.
 */
export class WizardSessionRegistry {
  private readonly sessions = new Map<string, WizardSessionRecord>();
  private readonly closeListeners = new Map<string, Set<SessionCloseListener>>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: WizardSessionRegistryOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  create(): WizardSessionRecord {
    this.sweep();
    const id = randomUUID();
    const timestamp = new Date(this.now());
    const record: WizardSessionRecord = {
      id,
      controller: this.options.createController(id),
      createdAt: timestamp,
      lastSeenAt: timestamp,
    };
    this.sessions.set(id, record);
    this.logger.info(`Started session ${id}`);
    return record;
  }

  get(id: string): WizardSessionRecord {
    const record = this.sessions.get(id);
    if (!record || this.isExpired(record)) {
      if (record) {
        this.drop(record);
      }
      throw new SessionNotFoundError(id);
    }
    record.lastSeenAt = new Date(this.now());
    return record;
  }

  /** Marks a live session as seen without failing for unknown ones. */
  touch(id: string): boolean {
    const record = this.sessions.get(id);
    if (!record || this.isExpired(record)) {
      return false;
    }
    record.lastSeenAt = new Date(this.now());
    return true;
  }

  delete(id: string): boolean {
    const record = this.sessions.get(id);
    if (!record) {
      return false;
    }
    this.drop(record);
    return true;
  }

  onClose(id: string, listener: SessionCloseListener): () => void {
    if (!this.sessions.has(id)) {
      throw new SessionNotFoundError(id);
    }
    const listeners = this.closeListeners.get(id) ?? new Set<SessionCloseListener>();
    listeners.add(listener);
    this.closeListeners.set(id, listeners);
    return () => {
      listeners.delete(listener);
    };
  }

  /** Removes expired sessions and returns how many were dropped. */
  sweep(): number {
    let removed = 0;
    for (const record of [...this.sessions.values()]) {
      if (this.isExpired(record)) {
        this.drop(record);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(record: WizardSessionRecord): boolean {
    return record.lastSeenAt.getTime() + this.options.ttlMs < this.now();
  }

  private drop(record: WizardSessionRecord): void {
    record.controller.reset();
    this.sessions.delete(record.id);
    const listeners = this.closeListeners.get(record.id) ?? new Set<SessionCloseListener>();
    this.closeListeners.delete(record.id);
    for (const listener of listeners) {
      try {
        listener(record);
      } catch (error) {
        this.logger.error(`Close listener for session ${record.id} threw`, error);
      }
    }
    this.logger.info(`Closed session ${record.id}`);
  }
}
