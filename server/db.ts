import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle } from 'drizzle-orm/neon-serverless';
import ws from "ws";
import * as schema from "@shared/schema";
import { getEngineConfig } from "./config/engineConfig";

neonConfig.webSocketConstructor = ws;

function createDb(databaseUrl: string) {
  const pool = new Pool({ connectionString: databaseUrl });
  return drizzle({ client: pool, schema });
}

export type Database = ReturnType<typeof createDb>;

let database: Database | null = null;

// Created on first use so tests and tooling can import storage without a database
export function getDb(): Database {
  if (!database) {
    const { DATABASE_URL } = getEngineConfig();
    if (!DATABASE_URL) {
      throw new Error(
        "DATABASE_URL must be set. Did you forget to provision a database?",
      );
    }
    database = createDb(DATABASE_URL);
  }
  return database;
}
