import { config } from "./config.js";
import { createApp } from "./app.js";
import { createPool } from "./db.js";
import { MemoryDispatchQueue } from "./queue/memoryQueue.js";
import { RedisDispatchQueue } from "./queue/redisQueue.js";
import type { DispatchQueue } from "./queue/types.js";
import { createServices } from "./services.js";
import { MemoryResultStore } from "./store/memoryStore.js";
import { PostgresResultStore } from "./store/postgresStore.js";
import type { ResultStore } from "./store/types.js";

function createStore(): ResultStore {
  if (config.storeBackend === "memory") {
    return new MemoryResultStore();
  }
  return new PostgresResultStore(createPool(config.databaseUrl));
}

function createQueue(): DispatchQueue {
  if (config.queueBackend === "memory") {
    return new MemoryDispatchQueue();
  }
  return RedisDispatchQueue.fromUrl(config.redisUrl);
}

async function main(): Promise<void> {
  const store = createStore();
  const queue = createQueue();
  await queue.ensureTopic(config.dispatchTopic);

  const services = createServices({ config, store, queue });
  const app = createApp({ config, ...services });
  const server = app.listen(config.apiPort, () => {
    console.log(
      `control-plane listening on port ${config.apiPort} (store=${config.storeBackend}, queue=${config.queueBackend})`
    );
  });

  const shutdown = async (): Promise<void> => {
    server.close();
    await queue.close();
    await store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
