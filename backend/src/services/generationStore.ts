/** Tracks generations: the running one and recently finished ones. */

import type { GenerationStatus } from '../models/generation.js';
import { GENERATION_RETENTION_MS } from '../utils/constants.js';

export interface GenerationEntry {
  id: string;
  status: GenerationStatus;
  controller: AbortController;
  startedAt: number;
  finishedAt: number | null;
  error: string | null;
}

export class GenerationBusyError extends Error {
  constructor(readonly runningId: string) {
    super('A generation is already running');
    this.name = 'GenerationBusyError';
  }
}

export class GenerationStore {
  private entries = new Map<string, GenerationEntry>();
  private cleanupTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(private readonly retentionMs = GENERATION_RETENTION_MS) {}

  /** The running generation, if any. */
  get active(): GenerationEntry | undefined {
    for (const entry of this.entries.values()) {
      if (entry.status === 'running') return entry;
    }
    return undefined;
  }

  /** Register a new running generation. Only one may run at a time. */
  start(id: string): GenerationEntry {
    const running = this.active;
    if (running) throw new GenerationBusyError(running.id);

    const entry: GenerationEntry = {
      id,
      status: 'running',
      controller: new AbortController(),
      startedAt: Date.now(),
      finishedAt: null,
      error: null,
    };
    this.entries.set(id, entry);
    return entry;
  }

  get(id: string): GenerationEntry | undefined {
    return this.entries.get(id);
  }

  /** Abort a running generation. Returns false when it is unknown or already finished. */
  cancel(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.status !== 'running') return false;
    entry.controller.abort();
    return true;
  }

  finish(id: string, status: Exclude<GenerationStatus, 'running'>, error: string | null = null): void {
    const entry = this.entries.get(id);
    if (!entry) return;
    entry.status = status;
    entry.error = error;
    entry.finishedAt = Date.now();
    this.scheduleCleanup(id);
  }

  /** Abort everything and drop all records. */
  clear(): void {
    for (const entry of this.entries.values()) {
      if (entry.status === 'running') entry.controller.abort();
    }
    for (const timer of this.cleanupTimers.values()) clearTimeout(timer);
    this.cleanupTimers.clear();
    this.entries.clear();
  }

  private scheduleCleanup(id: string): void {
    const existing = this.cleanupTimers.get(id);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.entries.delete(id);
      this.cleanupTimers.delete(id);
    }, this.retentionMs);
    timer.unref();
    this.cleanupTimers.set(id, timer);
  }
}
