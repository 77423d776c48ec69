import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { ZodError } from 'zod';
import { apiKeyMiddleware, API_KEY_HEADER } from './auth';
import {
  createItemSchema,
  createListSchema,
  itemParamsSchema,
  listParamsSchema,
  toggleItemSchema,
  updateItemSchema
} from './schemas';
import { ServiceResult, ShoppingListService } from './service';

/**
 * Aborts the returned signal if the client goes away before the response is
 * written, so the storage call in flight is cancelled with it.
 */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * HTTP API for shopping lists and their grocery items.
 */
export class ShoppingListServer {
  readonly app: express.Application;
  private port: number;
  private service: ShoppingListService;
  private apiKey: string;
  private httpServer?: Server;

  constructor(port: number, service: ShoppingListService, apiKey: string) {
    this.app = express();
    this.port = port;
    this.service = service;
    this.apiKey = apiKey;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    // CORS middleware
    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
      res.header('Access-Control-Allow-Headers', `Origin, X-Requested-With, Content-Type, Accept, ${API_KEY_HEADER}`);

      // Handle preflight requests
      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }

      next();
    });
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/api/health', (_req, res) => {
      res.json({ status: 'OK', timestamp: Date.now() });
    });

    this.app.use('/api/lists', apiKeyMiddleware(this.apiKey));

    // All lists with their items
    this.app.get('/api/lists', async (_req, res) => {
      await this.handle(res, 'listing shopping lists', 200, () =>
        this.service.getShoppingLists(abortOnDisconnect(res))
      );
    });

    // Create list
    this.app.post('/api/lists', async (req, res) => {
      const body = createListSchema.safeParse(req.body);
      if (!body.success) return this.badRequest(res, body.error);

      await this.handle(res, 'creating shopping list', 201, async () => {
        const result = await this.service.createShoppingList(body.data.name, abortOnDisconnect(res));
        if (result.status === 'ok') {
          console.log(`✅ Created list: ${result.body.name} (${result.body.id})`);
        }
        return result;
      });
    });

    // Delete list and its items
    this.app.delete('/api/lists/:listId', async (req, res) => {
      const params = listParamsSchema.safeParse(req.params);
      if (!params.success) return this.badRequest(res, params.error);

      await this.handle(res, 'deleting shopping list', 204, async () => {
        const result = await this.service.deleteShoppingList(params.data.listId, abortOnDisconnect(res));
        if (result.status === 'ok') {
          console.log(`✅ Deleted list: ${params.data.listId}`);
        }
        return result;
      });
    });

    // Add item
    this.app.post('/api/lists/:listId/items', async (req, res) => {
      const params = listParamsSchema.safeParse(req.params);
      if (!params.success) return this.badRequest(res, params.error);
      const body = createItemSchema.safeParse(req.body);
      if (!body.success) return this.badRequest(res, body.error);

      await this.handle(res, 'adding grocery item', 201, () =>
        this.service.addGroceryItem(params.data.listId, body.data.name, body.data.quantity, abortOnDisconnect(res))
      );
    });

    // Update item name and quantity
    this.app.put('/api/lists/:listId/items/:itemId', async (req, res) => {
      const params = itemParamsSchema.safeParse(req.params);
      if (!params.success) return this.badRequest(res, params.error);
      const body = updateItemSchema.safeParse(req.body);
      if (!body.success) return this.badRequest(res, body.error);

      await this.handle(res, 'updating grocery item', 200, () =>
        this.service.updateGroceryItem(
          params.data.listId,
          params.data.itemId,
          body.data.name,
          body.data.quantity,
          body.data.version,
          abortOnDisconnect(res)
        )
      );
    });

    // Flip the completed flag
    this.app.patch('/api/lists/:listId/items/:itemId/toggle', async (req, res) => {
      const params = itemParamsSchema.safeParse(req.params);
      if (!params.success) return this.badRequest(res, params.error);
      const body = toggleItemSchema.safeParse(req.body);
      if (!body.success) return this.badRequest(res, body.error);

      await this.handle(res, 'toggling grocery item', 200, () =>
        this.service.toggleGroceryItem(
          params.data.listId,
          params.data.itemId,
          body.data.version,
          abortOnDisconnect(res)
        )
      );
    });
  }

  private setupErrorHandling(): void {
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (isBodyParseError(err)) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      if (res.headersSent) {
        next(err);
        return;
      }
      console.error('Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private async handle<T>(
    res: Response,
    action: string,
    successStatus: 200 | 201 | 204,
    work: () => Promise<ServiceResult<T>>
  ): Promise<void> {
    try {
      const result = await work();
      switch (result.status) {
        case 'ok':
          if (successStatus === 204) res.status(204).end();
          else res.status(successStatus).json(result.body);
          return;
        case 'not-found':
          res.status(404).json({ error: result.error });
          return;
        case 'conflict':
          res.status(409).json(result.body);
          return;
      }
    } catch (error) {
      console.error(`Error ${action}:`, error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  }

  private badRequest(res: Response, error: ZodError): void {
    res.status(400).json({
      error: 'Invalid request',
      details: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, () => resolve());
      server.on('error', reject);
      this.httpServer = server;
    });
    console.log(`🚀 Shopping list server listening on port ${this.port}`);
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    this.httpServer = undefined;
    console.log('🛑 Shopping list server stopped');
  }
}
