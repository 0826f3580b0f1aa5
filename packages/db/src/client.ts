import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_API_POOL = { max: 20 };
const DEFAULT_WORKER_POOL = { max: 10 };

function connect(options: DbClientOptions, defaultMax: number, idleTimeout: number) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? defaultMax,
    idle_timeout: idleTimeout,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}

export function createDbClient(options: DbClientOptions) {
  return connect(options, DEFAULT_API_POOL.max, 20);
}

export function createWorkerDbClient(options: DbClientOptions) {
  return connect(options, DEFAULT_WORKER_POOL.max, 30);
}

export type DbHandle = ReturnType<typeof createDbClient>;
export type DbClient = DbHandle["db"];

export async function pingDatabase(db: DbClient): Promise<boolean> {
  await db.execute(sql`select 1`);
  return true;
}
