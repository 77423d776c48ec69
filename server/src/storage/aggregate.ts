import { GroceryItem, ListItemJoinRow, ShoppingList } from '../shared/types';
import { toFlag } from './Converters';

interface FoldState {
  order: number[];
  byId: Map<number, ShoppingList>;
}

function joinRowToItem(row: ListItemJoinRow, itemId: number): GroceryItem {
  if (
    row.item_name === null ||
    row.item_quantity === null ||
    row.item_completed === null ||
    row.item_created_at === null ||
    row.item_version === null
  ) {
    throw new Error(`item ${itemId} of list ${row.list_id} has null columns`);
  }

  return {
    id: itemId,
    listId: row.list_id,
    name: row.item_name,
    quantity: row.item_quantity,
    completed: toFlag(row.item_completed, 'items.completed'),
    createdAt: row.item_created_at,
    version: row.item_version
  };
}

function step(state: FoldState, row: ListItemJoinRow): FoldState {
  let list = state.byId.get(row.list_id);
  if (!list) {
    list = {
      id: row.list_id,
      name: row.list_name,
      createdAt: row.list_created_at,
      version: row.list_version,
      items: []
    };
    state.byId.set(row.list_id, list);
    state.order.push(row.list_id);
  }

  if (row.item_id !== null) {
    list.items.push(joinRowToItem(row, row.item_id));
  }

  return state;
}

/**
 * Regroups the flat lists LEFT JOIN items scan into list aggregates.
 *
 * The first row for a list id supplies its header; each row with a non-null
 * item id appends one item. Lists come out in first-seen order, tracked by an
 * explicit key list, and items in scan order.
 */
export function foldListRows(rows: readonly ListItemJoinRow[]): ShoppingList[] {
  const initial: FoldState = { order: [], byId: new Map() };
  const { order, byId } = rows.reduce(step, initial);

  return order.flatMap(id => {
    const list = byId.get(id);
    return list ? [list] : [];
  });
}
