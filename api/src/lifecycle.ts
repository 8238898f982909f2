import type { Server } from "node:http";
import type { Settings } from "./config.js";
import { logger } from "./logger.js";
import { MemoryScheduleStore } from "./store/memory-store.js";
import { MongoScheduleStore } from "./store/mongo-store.js";
import type { ScheduleStore } from "./store/store.js";

export async function openStore(config: Pick<Settings, "store" | "mongoUrl" | "dbName">): Promise<ScheduleStore> {
  if (config.store === "memory") {
    logger.warn("Using in-memory store; schedules are lost on restart");
    return new MemoryScheduleStore();
  }
  return MongoScheduleStore.connect(config.mongoUrl, config.dbName);
}

/** Stops accepting requests, waits for the ones in flight, then releases the store. */
export async function stop(server: Server, store: ScheduleStore): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  await store.close();
}
