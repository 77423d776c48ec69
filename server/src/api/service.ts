import { GroceryItem, ShoppingList } from '../shared/types';
import { NotFoundError, VersionConflictError } from '../shared/errors';
import { ShoppingListRepository } from '../storage/ShoppingListRepository';

export const STALE_CLIENT_STATE_ERROR = 'STALE_CLIENT_STATE';
export const STALE_CLIENT_STATE_MESSAGE = 'Client state is stale';

export interface GroceryItemModel {
  id: number;
  name: string;
  quantity: number;
  completed: boolean;
  version: number;
}

export interface ShoppingListModel {
  id: number;
  name: string;
  version: number;
  shoppingItems: GroceryItemModel[];
}

export interface ConflictResponse {
  currentVersion: number;
  error: typeof STALE_CLIENT_STATE_ERROR;
  message: string;
}

export type ServiceResult<T> =
  | { status: 'ok'; body: T }
  | { status: 'not-found'; error: string }
  | { status: 'conflict'; body: ConflictResponse };

export function toGroceryItemModel(item: GroceryItem): GroceryItemModel {
  return {
    id: item.id,
    name: item.name,
    quantity: item.quantity,
    completed: item.completed,
    version: item.version
  };
}

export function toShoppingListModel(list: ShoppingList): ShoppingListModel {
  return {
    id: list.id,
    name: list.name,
    version: list.version,
    shoppingItems: list.items.map(toGroceryItemModel)
  };
}

/**
 * Translates repository results and domain errors into transport-facing
 * outcomes. Anything that is not NotFound or a version conflict is rethrown.
 */
export class ShoppingListService {
  private repo: ShoppingListRepository;

  constructor(repo: ShoppingListRepository) {
    this.repo = repo;
  }

  async getShoppingLists(signal?: AbortSignal): Promise<ServiceResult<ShoppingListModel[]>> {
    const lists = await this.repo.listAll(signal);
    return { status: 'ok', body: lists.map(toShoppingListModel) };
  }

  async createShoppingList(name: string, signal?: AbortSignal): Promise<ServiceResult<ShoppingListModel>> {
    const list = await this.repo.createList(name, signal);
    return { status: 'ok', body: toShoppingListModel(list) };
  }

  async deleteShoppingList(listId: number, signal?: AbortSignal): Promise<ServiceResult<null>> {
    return this.mapDomainErrors('deleting shopping list', async () => {
      await this.repo.deleteList(listId, signal);
      return null;
    });
  }

  async addGroceryItem(
    listId: number,
    name: string,
    quantity: number,
    signal?: AbortSignal
  ): Promise<ServiceResult<GroceryItemModel>> {
    return this.mapDomainErrors('adding grocery item', async () =>
      toGroceryItemModel(await this.repo.createItem(listId, name, quantity, signal))
    );
  }

  async updateGroceryItem(
    listId: number,
    itemId: number,
    name: string,
    quantity: number,
    version: number,
    signal?: AbortSignal
  ): Promise<ServiceResult<GroceryItemModel>> {
    return this.mapDomainErrors('updating grocery item', async () =>
      toGroceryItemModel(await this.repo.updateItem(itemId, listId, name, quantity, version, signal))
    );
  }

  async toggleGroceryItem(
    listId: number,
    itemId: number,
    version: number,
    signal?: AbortSignal
  ): Promise<ServiceResult<GroceryItemModel>> {
    return this.mapDomainErrors('toggling grocery item', async () =>
      toGroceryItemModel(await this.repo.toggleItem(itemId, listId, version, signal))
    );
  }

  private async mapDomainErrors<T>(action: string, work: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return { status: 'ok', body: await work() };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { status: 'not-found', error: error.message };
      }
      if (error instanceof VersionConflictError) {
        console.warn(`⚠️ Stale client state when ${action}: ${error.message}`);
        return { status: 'conflict', body: createConflictResponse(error) };
      }
      throw error;
    }
  }
}

export function createConflictResponse(error: VersionConflictError): ConflictResponse {
  return {
    currentVersion: error.currentVersion,
    error: STALE_CLIENT_STATE_ERROR,
    message: STALE_CLIENT_STATE_MESSAGE
  };
}
