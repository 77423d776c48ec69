import { SQLiteStore } from '../src/storage/SQLiteStore';
import { ItemMutation, conditionalItemWrite } from '../src/storage/conditionalWrite';

const rename: ItemMutation = { assignments: 'name = ?', params: ['Oat milk'] };

describe('conditionalItemWrite', () => {
  let store: SQLiteStore;

  beforeEach(async () => {
    store = await SQLiteStore.open(':memory:');
    await store.run('INSERT INTO lists (name) VALUES (?)', ['Groceries']);
    await store.run('INSERT INTO lists (name) VALUES (?)', ['Hardware']);
    await store.run('INSERT INTO items (list_id, name, quantity) VALUES (?, ?, ?)', [1, 'Milk', 2]);
  });

  afterEach(async () => {
    await store.close();
  });

  test('updates the row and bumps its version when the version matches', async () => {
    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 1, expectedVersion: 1 }, rename);

    expect(outcome).toMatchObject({
      kind: 'updated',
      row: { id: 1, list_id: 1, name: 'Oat milk', quantity: 2, completed: 0, version: 2 }
    });
  });

  test('reports a conflict with the stored version when the version is stale', async () => {
    await store.run('UPDATE items SET version = 4 WHERE id = 1');

    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 1, expectedVersion: 3 }, rename);

    expect(outcome).toEqual({ kind: 'conflict', currentVersion: 4 });
    await expect(store.get('SELECT name, version FROM items WHERE id = 1')).resolves.toEqual({
      name: 'Milk',
      version: 4
    });
  });

  test('reports the item as missing when it does not exist', async () => {
    const outcome = await conditionalItemWrite(store, { itemId: 99, listId: 1, expectedVersion: 1 }, rename);

    expect(outcome).toEqual({ kind: 'not-found', resourceType: 'grocery item', resourceId: 99 });
  });

  test('reports the item as missing when it belongs to another list', async () => {
    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 2, expectedVersion: 1 }, rename);

    expect(outcome).toEqual({ kind: 'not-found', resourceType: 'grocery item', resourceId: 1 });
    await expect(store.get('SELECT name FROM items WHERE id = 1')).resolves.toEqual({ name: 'Milk' });
  });

  test('reports the list as missing when the owning list does not exist', async () => {
    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 42, expectedVersion: 1 }, rename);

    expect(outcome).toEqual({ kind: 'not-found', resourceType: 'shopping list', resourceId: 42 });
  });

  test('reports an infrastructure error when nothing explains the missed write', async () => {
    await store.exec('CREATE TRIGGER swallow_item_updates BEFORE UPDATE ON items BEGIN SELECT RAISE(IGNORE); END;');

    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 1, expectedVersion: 1 }, rename);

    expect(outcome.kind).toBe('infrastructure-error');
    if (outcome.kind === 'infrastructure-error') {
      expect(outcome.error.message).toBe(
        'write on grocery item 1 matched no row although version 1 is current'
      );
    }
  });

  test('reports an infrastructure error when the write itself fails', async () => {
    const badQuantity: ItemMutation = { assignments: 'quantity = ?', params: [0] };

    const outcome = await conditionalItemWrite(store, { itemId: 1, listId: 1, expectedVersion: 1 }, badQuantity);

    expect(outcome.kind).toBe('infrastructure-error');
    await expect(store.get('SELECT quantity, version FROM items WHERE id = 1')).resolves.toEqual({
      quantity: 2,
      version: 1
    });
  });
});
