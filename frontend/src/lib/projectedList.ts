import type { Change, SourceCache } from './sourceCache';
import { SelectableItem } from './selectableItem';

export interface ProjectedListOptions<T> {
  /** Text the search query is matched against. */
  titleOf: (item: T) => string;
  /** Orders `items` and `filtered`; insertion order when omitted. */
  compare?: (a: T, b: T) => number;
}

export interface ProjectedEntry<T, K> {
  key: K;
  wrapper: SelectableItem<T>;
}

/**
 * Selectable projection of a SourceCache. Keeps one SelectableItem per key,
 * a `filtered` view for the current search query and a `selected` view that
 * follows the selection flags.
 */
export class ProjectedList<T, K> {
  private readonly wrappers = new Map<K, SelectableItem<T>>();
  private readonly unsubscribeItem = new Map<K, () => void>();
  private readonly listeners = new Set<() => void>();
  private readonly disconnect: () => void;
  private query = '';
  private itemsView: SelectableItem<T>[] = [];
  private filteredView: SelectableItem<T>[] = [];
  private filteredEntriesView: ProjectedEntry<T, K>[] = [];
  private selectedView: SelectableItem<T>[] = [];
  private version = 0;

  constructor(
    source: SourceCache<T, K>,
    private readonly options: ProjectedListOptions<T>,
  ) {
    this.disconnect = source.connect((changes) => this.apply(changes));
    this.recompute();
  }

  get items(): readonly SelectableItem<T>[] {
    return this.itemsView;
  }

  get filtered(): readonly SelectableItem<T>[] {
    return this.filteredView;
  }

  /** `filtered` paired with the cache key of each entity. */
  get filteredEntries(): readonly ProjectedEntry<T, K>[] {
    return this.filteredEntriesView;
  }

  get selected(): readonly SelectableItem<T>[] {
    return this.selectedView;
  }

  get searchQuery(): string {
    return this.query;
  }

  /** Increments on every change; usable as an external-store snapshot. */
  get snapshot(): number {
    return this.version;
  }

  setSearchQuery(query: string): void {
    if (query === this.query) return;
    this.query = query;
    this.recompute();
  }

  clearSelection(): void {
    for (const wrapper of this.selectedView) wrapper.isSelected = false;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.disconnect();
    for (const unsubscribe of this.unsubscribeItem.values()) unsubscribe();
    this.unsubscribeItem.clear();
    this.wrappers.clear();
    this.listeners.clear();
  }

  private apply(changes: Change<T, K>[]): void {
    for (const change of changes) {
      switch (change.reason) {
        case 'add': {
          const wrapper = new SelectableItem(change.current);
          this.wrappers.set(change.key, wrapper);
          this.unsubscribeItem.set(change.key, wrapper.onSelectionChanged(() => this.recompute()));
          break;
        }
        case 'update': {
          const wrapper = this.wrappers.get(change.key);
          if (wrapper) wrapper.item = change.current;
          break;
        }
        case 'remove': {
          this.unsubscribeItem.get(change.key)?.();
          this.unsubscribeItem.delete(change.key);
          this.wrappers.delete(change.key);
          break;
        }
      }
    }
    this.recompute();
  }

  private recompute(): void {
    const entries = [...this.wrappers].map(([key, wrapper]) => ({ key, wrapper }));
    const { compare, titleOf } = this.options;
    if (compare) entries.sort((a, b) => compare(a.wrapper.item, b.wrapper.item));

    const needle = this.query.trim().toLowerCase();
    const all = entries.map((entry) => entry.wrapper);
    this.itemsView = all;
    this.filteredEntriesView = needle === ''
      ? entries
      : entries.filter((entry) => titleOf(entry.wrapper.item).toLowerCase().includes(needle));
    this.filteredView = this.filteredEntriesView.map((entry) => entry.wrapper);
    this.selectedView = all.filter((wrapper) => wrapper.isSelected);
    this.version += 1;
    for (const listener of [...this.listeners]) listener();
  }
}
