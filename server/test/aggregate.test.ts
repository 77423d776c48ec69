import { foldListRows } from '../src/storage/aggregate';
import { ListItemJoinRow } from '../src/shared/types';

function listOnly(id: number, name: string): ListItemJoinRow {
  return {
    list_id: id,
    list_name: name,
    list_created_at: '2024-01-01T00:00:00.000Z',
    list_version: 1,
    item_id: null,
    item_name: null,
    item_quantity: null,
    item_completed: null,
    item_created_at: null,
    item_version: null
  };
}

function withItem(listId: number, listName: string, itemId: number, itemName: string, completed = 0): ListItemJoinRow {
  return {
    ...listOnly(listId, listName),
    item_id: itemId,
    item_name: itemName,
    item_quantity: 1,
    item_completed: completed,
    item_created_at: '2024-01-02T00:00:00.000Z',
    item_version: 1
  };
}

describe('foldListRows', () => {
  test('returns an empty array for no rows', () => {
    expect(foldListRows([])).toEqual([]);
  });

  test('gives a list without items an empty item array', () => {
    const lists = foldListRows([listOnly(1, 'Hardware')]);

    expect(lists).toEqual([
      { id: 1, name: 'Hardware', createdAt: '2024-01-01T00:00:00.000Z', version: 1, items: [] }
    ]);
  });

  test('groups items under their list in scan order', () => {
    const lists = foldListRows([
      withItem(2, 'Groceries', 10, 'Milk'),
      withItem(2, 'Groceries', 11, 'Eggs', 1),
      withItem(2, 'Groceries', 12, 'Bread')
    ]);

    expect(lists).toHaveLength(1);
    expect(lists[0].items.map(item => item.name)).toEqual(['Milk', 'Eggs', 'Bread']);
    expect(lists[0].items[1]).toEqual({
      id: 11,
      listId: 2,
      name: 'Eggs',
      quantity: 1,
      completed: true,
      createdAt: '2024-01-02T00:00:00.000Z',
      version: 1
    });
  });

  test('keeps lists in first-seen order even when ids are not ascending', () => {
    const lists = foldListRows([
      withItem(5, 'Party', 1, 'Chips'),
      listOnly(3, 'Hardware'),
      withItem(5, 'Party', 2, 'Soda'),
      withItem(4, 'Pharmacy', 3, 'Plasters')
    ]);

    expect(lists.map(list => list.id)).toEqual([5, 3, 4]);
    expect(lists.map(list => list.items.length)).toEqual([2, 0, 1]);
  });

  test('takes list header fields from the first row seen', () => {
    const first = withItem(1, 'Groceries', 1, 'Milk');
    const later = { ...withItem(1, 'Renamed', 2, 'Eggs'), list_version: 9 };

    const [list] = foldListRows([first, later]);

    expect(list.name).toBe('Groceries');
    expect(list.version).toBe(1);
    expect(list.items).toHaveLength(2);
  });

  test('rejects an item row with missing columns', () => {
    const broken = { ...withItem(1, 'Groceries', 7, 'Milk'), item_quantity: null };

    expect(() => foldListRows([broken])).toThrow('item 7 of list 1 has null columns');
  });

  test('rejects a completed flag that is neither 0 nor 1', () => {
    expect(() => foldListRows([withItem(1, 'Groceries', 7, 'Milk', 2)])).toThrow(
      'unexpected value 2 in column items.completed'
    );
  });
});
