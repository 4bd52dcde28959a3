import { Pool, PoolClient, types } from 'pg';
import { getConfig, requireSetting } from './config';

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * PostgreSQL connection pool for database operations.
 * Configured via the DATABASE_URL environment variable and created on first use.
 * NUMERIC columns are returned as strings by pg, which keeps decimals exact.
 */
let pool: Pool | null = null;

const getPool = (): Pool => {
  if (!pool) {
    pool = new Pool({
      connectionString: requireSetting(getConfig().databaseUrl, 'DATABASE_URL'),
    });
  }
  return pool;
};

/**
 * Tests the database connection by executing a simple query.
 * Should be called during application startup to ensure database connectivity.
 *
 * @throws {Error} If database connection fails
 *
 * @example
 * await testConnection();
 * console.log('Database is ready');
 */
const testConnection = async (): Promise<void> => {
  try {
    const db = getPool();
    await db.query('SELECT NOW()');
    console.log('✅ Database connection successful.');
  } catch (err) {
    console.error('❌ Database connection failed:', err);
    throw err; // Rethrow to be caught by the caller
  }
};

/**
 * Returns the PostgreSQL connection pool for executing queries.
 *
 * @example
 * const db = getDbClient();
 * const result = await db.query('SELECT * FROM clients WHERE user_id = $1', [userId]);
 */
const getDbClient = (): Pool => {
  return getPool();
};

/**
 * Runs work inside BEGIN/COMMIT on one pooled client, rolling back on any error.
 *
 * @example
 * await withTransaction(db, async (client) => {
 *   await client.query('DELETE FROM line_items WHERE invoice_id = $1', [invoiceId]);
 * });
 */
const withTransaction = async <T>(db: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Closes the database connection pool.
 * Should be called when shutting down the application.
 */
const closeDbConnection = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('✅ Database connection closed.');
  }
};

export { testConnection, getDbClient, withTransaction, closeDbConnection };
