import { describe, it, expect, afterEach, vi } from 'vitest';
import { GenerationBusyError, GenerationStore } from './generationStore.js';

describe('GenerationStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows one running generation at a time', () => {
    const store = new GenerationStore();
    store.start('g1');

    expect(() => store.start('g2')).toThrow(GenerationBusyError);
    expect(store.active?.id).toBe('g1');

    store.finish('g1', 'completed');
    expect(store.active).toBeUndefined();
    expect(store.start('g2').status).toBe('running');
  });

  it('aborts a running generation on cancel', () => {
    const store = new GenerationStore();
    const entry = store.start('g1');

    expect(store.cancel('g1')).toBe(true);
    expect(entry.controller.signal.aborted).toBe(true);
  });

  it('refuses to cancel unknown or finished generations', () => {
    const store = new GenerationStore();
    store.start('g1');
    store.finish('g1', 'failed', 'boom');

    expect(store.cancel('g1')).toBe(false);
    expect(store.cancel('nope')).toBe(false);
    expect(store.get('g1')).toMatchObject({ status: 'failed', error: 'boom' });
  });

  it('drops finished generations after the retention period', () => {
    vi.useFakeTimers();
    const store = new GenerationStore(1_000);
    store.start('g1');
    store.finish('g1', 'completed');

    vi.advanceTimersByTime(999);
    expect(store.get('g1')).toBeDefined();
    vi.advanceTimersByTime(1);
    expect(store.get('g1')).toBeUndefined();
  });

  it('aborts running generations on clear', () => {
    const store = new GenerationStore();
    const entry = store.start('g1');

    store.clear();

    expect(entry.controller.signal.aborted).toBe(true);
    expect(store.get('g1')).toBeUndefined();
  });
});
