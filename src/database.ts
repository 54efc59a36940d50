import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";

/**
 * Database client interface - compatible with pg.Client, pg.Pool and PGlite
 */
export interface DbClient {
	query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface Database {
	readonly client: DbClient;
	close(): Promise<void>;
}

/**
 * Open a database connection.
 *
 * Connection string formats:
 * - `pglite:` or `pglite::memory:` - In-memory PGlite database
 * - `pglite:/path/to/dir` - PGlite database persisted to filesystem
 * - `postgresql://...` or other - PostgreSQL connection string
 */
export async function openDatabase(connectionString: string): Promise<Database> {
	if (connectionString.startsWith("pglite:")) {
		const pglitePath = connectionString.slice("pglite:".length);
		const db = new PGlite(pglitePath || undefined);
		await db.waitReady;
		return {
			client: db,
			close: () => db.close(),
		};
	}

	const client = new Client({ connectionString });
	await client.connect();

	return {
		client,
		close: () => client.end(),
	};
}
