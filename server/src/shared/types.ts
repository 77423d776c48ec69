export interface GroceryItem {
  id: number;
  listId: number;
  name: string;
  quantity: number;
  completed: boolean;
  createdAt: string;
  version: number;
}

export interface ShoppingList {
  id: number;
  name: string;
  createdAt: string;
  version: number;
  items: GroceryItem[];
}

export type ResourceType = 'shopping list' | 'grocery item';

/** Row shapes as sqlite3 hands them back. Booleans arrive as 0/1. */
export interface ListRow {
  id: number;
  name: string;
  created_at: string;
  version: number;
}

export interface ItemRow {
  id: number;
  list_id: number;
  name: string;
  quantity: number;
  completed: number;
  created_at: string;
  version: number;
}

/**
 * One row of the lists LEFT JOIN items scan. Item columns are null for a
 * list without items.
 */
export interface ListItemJoinRow {
  list_id: number;
  list_name: string;
  list_created_at: string;
  list_version: number;
  item_id: number | null;
  item_name: string | null;
  item_quantity: number | null;
  item_completed: number | null;
  item_created_at: string | null;
  item_version: number | null;
}
