import { GroceryItem, ItemRow, ListRow, ShoppingList } from '../shared/types';

/**
 * Converts a stored 0/1 flag. Anything else means the row does not decode.
 */
export function toFlag(value: number, column: string): boolean {
  if (value === 0) return false;
  if (value === 1) return true;
  throw new Error(`unexpected value ${value} in column ${column}`);
}

/**
 * Converts a lists row into a list entity with no items attached.
 */
export function listRowToEntity(row: ListRow): ShoppingList {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.created_at,
    version: row.version,
    items: []
  };
}

/**
 * Converts an items row into its entity.
 */
export function itemRowToEntity(row: ItemRow): GroceryItem {
  return {
    id: row.id,
    listId: row.list_id,
    name: row.name,
    quantity: row.quantity,
    completed: toFlag(row.completed, 'items.completed'),
    createdAt: row.created_at,
    version: row.version
  };
}
