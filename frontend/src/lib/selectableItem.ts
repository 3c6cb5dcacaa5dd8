/** Pairs an entity with a selection flag; flag changes notify listeners synchronously. */

export type SelectionListener<T> = (item: SelectableItem<T>) => void;

export class SelectableItem<T> {
  private selected = false;
  private readonly listeners = new Set<SelectionListener<T>>();

  constructor(public item: T) {}

  get isSelected(): boolean {
    return this.selected;
  }

  set isSelected(value: boolean) {
    if (this.selected === value) return;
    this.selected = value;
    for (const listener of [...this.listeners]) listener(this);
  }

  toggle(): void {
    this.isSelected = !this.selected;
  }

  onSelectionChanged(listener: SelectionListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
