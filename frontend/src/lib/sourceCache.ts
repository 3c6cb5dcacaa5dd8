/** Keyed observable cache publishing add / update / remove change sets to its subscribers. */

export type Change<T, K> =
  | { reason: 'add'; key: K; current: T }
  | { reason: 'update'; key: K; current: T; previous: T }
  | { reason: 'remove'; key: K; current: T };

export type ChangeListener<T, K> = (changes: Change<T, K>[]) => void;

/** Structural equality over plain JSON-like values. */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;
  if (Array.isArray(a) !== Array.isArray(b)) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, i) => deepEqual(value, b[i]));
  }
  const aKeys = Object.keys(a).filter((k) => Reflect.get(a, k) !== undefined);
  const bKeys = Object.keys(b).filter((k) => Reflect.get(b, k) !== undefined);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((k) => deepEqual(Reflect.get(a, k), Reflect.get(b, k)));
}

export class SourceCache<T, K> {
  private readonly entries = new Map<K, T>();
  private readonly listeners = new Set<ChangeListener<T, K>>();

  constructor(
    private readonly keyOf: (item: T) => K,
    private readonly equals: (a: T, b: T) => boolean = deepEqual,
  ) {}

  get items(): T[] {
    return [...this.entries.values()];
  }

  get keys(): K[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(key: K): T | undefined {
    return this.entries.get(key);
  }

  /**
   * Subscribe to change sets. The listener first receives the current
   * contents as adds. Returns the unsubscribe function.
   */
  connect(listener: ChangeListener<T, K>): () => void {
    this.listeners.add(listener);
    if (this.entries.size > 0) {
      listener([...this.entries].map(([key, current]): Change<T, K> => ({ reason: 'add', key, current })));
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  addOrUpdate(items: readonly T[]): void {
    const changes: Change<T, K>[] = [];
    for (const item of items) {
      const change = this.upsert(item);
      if (change) changes.push(change);
    }
    this.publish(changes);
  }

  remove(keys: readonly K[]): void {
    const changes: Change<T, K>[] = [];
    for (const key of keys) {
      const current = this.entries.get(key);
      if (current === undefined) continue;
      this.entries.delete(key);
      changes.push({ reason: 'remove', key, current });
    }
    this.publish(changes);
  }

  clear(): void {
    this.remove(this.keys);
  }

  /**
   * Replace the contents with `items`: keys missing from `items` are removed,
   * new keys added, and existing keys updated only when the value differs.
   */
  editDiff(items: readonly T[]): void {
    const incoming = new Map<K, T>();
    for (const item of items) incoming.set(this.keyOf(item), item);

    const changes: Change<T, K>[] = [];
    for (const [key, current] of this.entries) {
      if (!incoming.has(key)) {
        this.entries.delete(key);
        changes.push({ reason: 'remove', key, current });
      }
    }
    for (const item of incoming.values()) {
      const change = this.upsert(item);
      if (change) changes.push(change);
    }
    this.publish(changes);
  }

  private upsert(item: T): Change<T, K> | null {
    const key = this.keyOf(item);
    const previous = this.entries.get(key);
    if (previous === undefined) {
      this.entries.set(key, item);
      return { reason: 'add', key, current: item };
    }
    if (this.equals(previous, item)) return null;
    this.entries.set(key, item);
    return { reason: 'update', key, current: item, previous };
  }

  private publish(changes: Change<T, K>[]): void {
    if (changes.length === 0) return;
    for (const listener of [...this.listeners]) listener(changes);
  }
}
