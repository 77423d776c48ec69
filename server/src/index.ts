import { loadEnv } from './config/env';
import { ShoppingListServer } from './api/server';
import { ShoppingListService } from './api/service';
import { SQLiteStore } from './storage/SQLiteStore';
import { SQLiteShoppingListRepository } from './storage/ShoppingListRepository';

// Start the server
async function main() {
  const env = loadEnv();

  const store = await SQLiteStore.open(env.DB_PATH);
  console.log(`✅ Database ready at ${env.DB_PATH}`);

  const repository = new SQLiteShoppingListRepository(store);
  const service = new ShoppingListService(repository);
  const server = new ShoppingListServer(env.PORT, service, env.API_KEY);
  await server.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down...`);
    await server.stop();
    await store.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        console.error('Failed to shut down cleanly:', err);
        process.exit(1);
      });
    });
  }
}

main().catch(err => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});
