import { GroceryItem, ItemRow, ListItemJoinRow, ListRow, ShoppingList } from '../shared/types';
import { ErrorContext, InfrastructureError, NotFoundError, VersionConflictError, isDomainError } from '../shared/errors';
import { SQLiteStore, isForeignKeyViolation } from './SQLiteStore';
import { ConditionalWriteOutcome, ItemMutation, ItemWriteTarget, conditionalItemWrite } from './conditionalWrite';
import { itemRowToEntity, listRowToEntity } from './Converters';
import { foldListRows } from './aggregate';

export interface ShoppingListRepository {
  createList(name: string, signal?: AbortSignal): Promise<ShoppingList>;
  getList(listId: number, signal?: AbortSignal): Promise<ShoppingList>;
  listAll(signal?: AbortSignal): Promise<ShoppingList[]>;
  deleteList(listId: number, signal?: AbortSignal): Promise<void>;
  createItem(listId: number, name: string, quantity: number, signal?: AbortSignal): Promise<GroceryItem>;
  updateItem(
    itemId: number,
    listId: number,
    name: string,
    quantity: number,
    expectedVersion: number,
    signal?: AbortSignal
  ): Promise<GroceryItem>;
  toggleItem(itemId: number, listId: number, expectedVersion: number, signal?: AbortSignal): Promise<GroceryItem>;
}

const createListQuery = `
  INSERT INTO lists (name, version)
  VALUES (?, 1)
  RETURNING id, name, created_at, version`;

const getListByIdQuery = `
  SELECT id, name, created_at, version
  FROM lists
  WHERE id = ?`;

const listAllQuery = `
  SELECT
    l.id AS list_id, l.name AS list_name, l.created_at AS list_created_at, l.version AS list_version,
    i.id AS item_id, i.name AS item_name, i.quantity AS item_quantity, i.completed AS item_completed,
    i.created_at AS item_created_at, i.version AS item_version
  FROM lists l
  LEFT JOIN items i ON i.list_id = l.id
  ORDER BY l.id, i.id`;

const deleteItemsByListQuery = 'DELETE FROM items WHERE list_id = ?';
const deleteListQuery = 'DELETE FROM lists WHERE id = ?';

const createItemQuery = `
  INSERT INTO items (list_id, name, quantity, completed, version)
  VALUES (?, ?, ?, 0, 1)
  RETURNING id, list_id, name, quantity, completed, created_at, version`;

const toggleMutation: ItemMutation = {
  assignments: 'completed = NOT completed',
  params: []
};

/**
 * Shopping lists and their items on SQLite, with optimistic concurrency on
 * item writes.
 */
export class SQLiteShoppingListRepository implements ShoppingListRepository {
  private store: SQLiteStore;

  constructor(store: SQLiteStore) {
    this.store = store;
  }

  async createList(name: string, signal?: AbortSignal): Promise<ShoppingList> {
    return this.guard('createList', { name }, async () => {
      const row = await this.store.get<ListRow>(createListQuery, [name], signal);
      if (!row) throw new Error('insert returned no row');
      return listRowToEntity(row);
    });
  }

  async getList(listId: number, signal?: AbortSignal): Promise<ShoppingList> {
    return this.guard('getList', { listId }, async () => {
      const row = await this.store.get<ListRow>(getListByIdQuery, [listId], signal);
      if (!row) throw new NotFoundError('shopping list', listId);
      return listRowToEntity(row);
    });
  }

  async listAll(signal?: AbortSignal): Promise<ShoppingList[]> {
    return this.guard('listAll', {}, async () => {
      const rows = await this.store.all<ListItemJoinRow>(listAllQuery, [], signal);
      return foldListRows(rows);
    });
  }

  /**
   * Removes the list and every item under it in one transaction. A missing
   * list rolls back and rejects with NotFoundError.
   */
  async deleteList(listId: number, signal?: AbortSignal): Promise<void> {
    return this.guard('deleteList', { listId }, () =>
      this.store.transaction(async tx => {
        await tx.run(deleteItemsByListQuery, [listId]);
        const result = await tx.run(deleteListQuery, [listId]);
        if (result.changes === 0) {
          throw new NotFoundError('shopping list', listId);
        }
      }, signal)
    );
  }

  /**
   * The existence check and the insert are separate statements; the items
   * foreign key rejects an insert racing a concurrent delete of the list.
   */
  async createItem(listId: number, name: string, quantity: number, signal?: AbortSignal): Promise<GroceryItem> {
    return this.guard('createItem', { listId, name, quantity }, async () => {
      const list = await this.store.get<ListRow>(getListByIdQuery, [listId], signal);
      if (!list) throw new NotFoundError('shopping list', listId);

      let row: ItemRow | undefined;
      try {
        row = await this.store.get<ItemRow>(createItemQuery, [listId, name, quantity], signal);
      } catch (error) {
        if (isForeignKeyViolation(error)) throw new NotFoundError('shopping list', listId);
        throw error;
      }
      if (!row) throw new Error('insert returned no row');
      return itemRowToEntity(row);
    });
  }

  async updateItem(
    itemId: number,
    listId: number,
    name: string,
    quantity: number,
    expectedVersion: number,
    signal?: AbortSignal
  ): Promise<GroceryItem> {
    const target: ItemWriteTarget = { itemId, listId, expectedVersion };
    const mutation: ItemMutation = {
      assignments: 'name = ?, quantity = ?',
      params: [name, quantity]
    };
    const outcome = await conditionalItemWrite(this.store, target, mutation, signal);
    return this.settle('updateItem', target, outcome);
  }

  async toggleItem(itemId: number, listId: number, expectedVersion: number, signal?: AbortSignal): Promise<GroceryItem> {
    const target: ItemWriteTarget = { itemId, listId, expectedVersion };
    const outcome = await conditionalItemWrite(this.store, target, toggleMutation, signal);
    return this.settle('toggleItem', target, outcome);
  }

  private settle(
    operation: string,
    target: ItemWriteTarget,
    outcome: ConditionalWriteOutcome<ItemRow>
  ): GroceryItem {
    const context: ErrorContext = {
      itemId: target.itemId,
      listId: target.listId,
      expectedVersion: target.expectedVersion
    };

    switch (outcome.kind) {
      case 'updated':
        try {
          return itemRowToEntity(outcome.row);
        } catch (error) {
          throw new InfrastructureError(operation, context, error);
        }
      case 'not-found':
        throw new NotFoundError(outcome.resourceType, outcome.resourceId);
      case 'conflict':
        throw new VersionConflictError('grocery item', target.itemId, outcome.currentVersion, target.expectedVersion);
      case 'infrastructure-error':
        throw new InfrastructureError(operation, context, outcome.error);
    }
  }

  /**
   * Lets domain errors through untouched and wraps everything else with the
   * operation name and identifiers.
   */
  private async guard<T>(operation: string, context: ErrorContext, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isDomainError(error)) throw error;
      throw new InfrastructureError(operation, context, error);
    }
  }
}
