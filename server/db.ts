import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonDatabase } from 'drizzle-orm/neon-serverless';
import ws from "ws";
import * as schema from "@shared/schema";

neonConfig.webSocketConstructor = ws;

export type LedgerDatabase = NeonDatabase<typeof schema>;

export interface DatabaseHandle {
  db: LedgerDatabase;
  close(): Promise<void>;
}

/**
 * Builds the pool and drizzle handle once at process start. Callers own the
 * handle and must close it on shutdown.
 */
export function createDatabase(databaseUrl: string | undefined): DatabaseHandle {
  if (!databaseUrl) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  const pool = new Pool({ connectionString: databaseUrl });

  pool.on('error', (err) => {
    console.error('[DB Pool] Unexpected error on idle client', err);
  });

  const db = drizzle({ client: pool, schema });
  console.log('[DB] Pool initialized');

  return {
    db,
    close: async () => {
      await pool.end();
      console.log('[DB] Pool closed');
    },
  };
}
