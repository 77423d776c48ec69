import { ItemRow, ResourceType } from '../shared/types';
import { isErrorLike } from '../shared/errors';
import { SQLiteStore } from './SQLiteStore';

export type ConditionalWriteOutcome<T> =
  | { kind: 'updated'; row: T }
  | { kind: 'not-found'; resourceType: ResourceType; resourceId: number }
  | { kind: 'conflict'; currentVersion: number }
  | { kind: 'infrastructure-error'; error: Error };

export interface ItemWriteTarget {
  itemId: number;
  listId: number;
  expectedVersion: number;
}

/**
 * The SET clause of a versioned item write, minus the version bump which the
 * protocol adds itself.
 */
export interface ItemMutation {
  assignments: string;
  params: unknown[];
}

interface VersionProbeRow {
  list_exists: number;
  item_version: number | null;
}

const ITEM_COLUMNS = 'id, list_id, name, quantity, completed, created_at, version';

const probeItemVersionQuery = `
  SELECT
    EXISTS (SELECT 1 FROM lists WHERE id = ?) AS list_exists,
    (SELECT version FROM items WHERE id = ? AND list_id = ?) AS item_version`;

function asError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(String(error));
}

/**
 * Works out why a conditional write matched nothing: the list is gone, the
 * item is gone (or lives under another list), or its version moved on.
 */
async function disambiguate(
  store: SQLiteStore,
  target: ItemWriteTarget,
  signal?: AbortSignal
): Promise<ConditionalWriteOutcome<ItemRow>> {
  let probe: VersionProbeRow | undefined;
  try {
    probe = await store.get<VersionProbeRow>(
      probeItemVersionQuery,
      [target.listId, target.itemId, target.listId],
      signal
    );
  } catch (error) {
    return { kind: 'infrastructure-error', error: asError(error) };
  }

  if (!probe) {
    return { kind: 'infrastructure-error', error: new Error('version probe returned no row') };
  }
  if (probe.list_exists === 0) {
    return { kind: 'not-found', resourceType: 'shopping list', resourceId: target.listId };
  }
  if (probe.item_version === null) {
    return { kind: 'not-found', resourceType: 'grocery item', resourceId: target.itemId };
  }
  if (probe.item_version !== target.expectedVersion) {
    return { kind: 'conflict', currentVersion: probe.item_version };
  }

  return {
    kind: 'infrastructure-error',
    error: new Error(
      `write on grocery item ${target.itemId} matched no row although version ${probe.item_version} is current`
    )
  };
}

/**
 * Applies `mutation` to one item only if it still sits under `listId` at
 * `expectedVersion`, bumping the version in the same statement.
 *
 * When nothing matches, a second unconditional lookup decides between
 * not-found and conflict. Matching more than one row breaks the primary key
 * invariant and comes back as an infrastructure error.
 */
export async function conditionalItemWrite(
  store: SQLiteStore,
  target: ItemWriteTarget,
  mutation: ItemMutation,
  signal?: AbortSignal
): Promise<ConditionalWriteOutcome<ItemRow>> {
  const sql = `
    UPDATE items
    SET ${mutation.assignments}, version = version + 1
    WHERE id = ? AND list_id = ? AND version = ?
    AND EXISTS (SELECT 1 FROM lists WHERE id = ?)
    RETURNING ${ITEM_COLUMNS}`;

  let rows: ItemRow[];
  try {
    rows = await store.all<ItemRow>(
      sql,
      [...mutation.params, target.itemId, target.listId, target.expectedVersion, target.listId],
      signal
    );
  } catch (error) {
    return { kind: 'infrastructure-error', error: asError(error) };
  }

  const [row, ...extra] = rows;
  if (!row) {
    return disambiguate(store, target, signal);
  }
  if (extra.length > 0) {
    return {
      kind: 'infrastructure-error',
      error: new Error(`write on grocery item ${target.itemId} matched ${rows.length} rows`)
    };
  }

  return { kind: 'updated', row };
}
