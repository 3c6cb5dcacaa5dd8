import { describe, it, expect, vi } from 'vitest';
import { ProjectedList } from './projectedList';
import { SelectableItem } from './selectableItem';
import { SourceCache } from './sourceCache';

interface Ext {
  id: string;
  title: string;
}

function setup(items: Ext[] = []) {
  const cache = new SourceCache<Ext, string>((e) => e.id);
  cache.addOrUpdate(items);
  const list = new ProjectedList(cache, {
    titleOf: (e) => e.title,
    compare: (a, b) => a.title.localeCompare(b.title),
  });
  return { cache, list };
}

const titles = (wrappers: readonly SelectableItem<Ext>[]) => wrappers.map((w) => w.item.title);

describe('SelectableItem', () => {
  it('notifies on flag changes only', () => {
    const item = new SelectableItem({ id: 'a', title: 'A' });
    const listener = vi.fn();
    item.onSelectionChanged(listener);

    item.isSelected = false;
    item.isSelected = true;
    item.toggle();

    expect(listener).toHaveBeenCalledTimes(2);
    expect(item.isSelected).toBe(false);
  });
});

describe('ProjectedList', () => {
  it('wraps the cache contents in order', () => {
    const { list } = setup([{ id: '2', title: 'Beta' }, { id: '1', title: 'Alpha' }]);
    expect(titles(list.items)).toEqual(['Alpha', 'Beta']);
    expect(titles(list.filtered)).toEqual(['Alpha', 'Beta']);
    expect(list.selected).toEqual([]);
  });

  it('updates the selected view within the same call', () => {
    const { list } = setup([{ id: '1', title: 'Alpha' }, { id: '2', title: 'Beta' }]);

    list.items[1].isSelected = true;

    expect(titles(list.selected)).toEqual(['Beta']);
    list.items[1].isSelected = false;
    expect(list.selected).toEqual([]);
  });

  it('keeps the selection of an updated entity', () => {
    const { cache, list } = setup([{ id: '1', title: 'Alpha' }]);
    const wrapper = list.items[0];
    wrapper.isSelected = true;

    cache.addOrUpdate([{ id: '1', title: 'Alpha v2' }]);

    expect(list.items[0]).toBe(wrapper);
    expect(wrapper.item.title).toBe('Alpha v2');
    expect(titles(list.selected)).toEqual(['Alpha v2']);
  });

  it('drops removed entities from every view', () => {
    const { cache, list } = setup([{ id: '1', title: 'Alpha' }, { id: '2', title: 'Beta' }]);
    list.items[0].isSelected = true;

    cache.remove(['1']);

    expect(titles(list.items)).toEqual(['Beta']);
    expect(list.selected).toEqual([]);
  });

  it('filters by case-insensitive title substring', () => {
    const { list } = setup([
      { id: '1', title: 'Impact Pack' },
      { id: '2', title: 'ControlNet Aux' },
      { id: '3', title: 'Image Saver' },
    ]);

    list.setSearchQuery('PACK');
    expect(titles(list.filtered)).toEqual(['Impact Pack']);

    list.setSearchQuery('im');
    expect(titles(list.filtered)).toEqual(['Image Saver', 'Impact Pack']);
  });

  it('pairs filtered entities with their cache keys', () => {
    const { list } = setup([
      { id: 'b', title: 'Tools' },
      { id: 'a', title: 'Tools' },
      { id: 'c', title: 'Image Saver' },
    ]);

    list.setSearchQuery('tools');

    expect(list.filteredEntries.map((entry) => entry.key)).toEqual(['b', 'a']);
    expect(list.filteredEntries.map((entry) => entry.wrapper)).toEqual(list.filtered);
  });

  it('matches everything for a blank query', () => {
    const { list } = setup([{ id: '1', title: 'Alpha' }, { id: '2', title: 'Beta' }]);
    list.setSearchQuery('zzz');
    expect(list.filtered).toEqual([]);

    list.setSearchQuery('   ');

    expect(titles(list.filtered)).toEqual(['Alpha', 'Beta']);
  });

  it('applies the query to entities added later', () => {
    const { cache, list } = setup();
    list.setSearchQuery('saver');

    cache.addOrUpdate([{ id: '1', title: 'Image Saver' }, { id: '2', title: 'Other' }]);

    expect(titles(list.filtered)).toEqual(['Image Saver']);
  });

  it('clears every selection flag', () => {
    const { list } = setup([{ id: '1', title: 'Alpha' }, { id: '2', title: 'Beta' }]);
    list.items[0].isSelected = true;
    list.items[1].isSelected = true;

    list.clearSelection();

    expect(list.selected).toEqual([]);
    expect(list.items.every((w) => !w.isSelected)).toBe(true);
  });

  it('notifies subscribers and bumps the snapshot on change', () => {
    const { list } = setup([{ id: '1', title: 'Alpha' }]);
    const listener = vi.fn();
    list.subscribe(listener);
    const before = list.snapshot;

    list.items[0].isSelected = true;

    expect(listener).toHaveBeenCalledTimes(1);
    expect(list.snapshot).toBe(before + 1);
  });

  it('stops following the cache after dispose', () => {
    const { cache, list } = setup([{ id: '1', title: 'Alpha' }]);
    list.dispose();

    cache.addOrUpdate([{ id: '2', title: 'Beta' }]);

    expect(titles(list.items)).toEqual(['Alpha']);
  });
});
