import { Pool, QueryResultRow } from 'pg';
import { ClientRecord } from '../../models/business/client.model';
import { getDbClient } from '../../utils/database';
import { translateDbError } from './pg-error';
import { ClientStore } from './store.types';

type ClientRow = ClientRecord & QueryResultRow;

const CLIENT_COLUMNS = `id, user_id, name, email, street, city, state, zip_code, country, phone, created_at, updated_at`;

/**
 * Postgres-backed client store.
 *
 * @class PgClientStore
 */
export class PgClientStore implements ClientStore {
  constructor(private readonly db: Pool = getDbClient()) {}

  async insert(record: ClientRecord): Promise<ClientRecord> {
    const queryText = `
      INSERT INTO clients (id, user_id, name, email, street, city, state, zip_code, country, phone, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
      RETURNING ${CLIENT_COLUMNS}
    `;
    const values = [
      record.id,
      record.user_id,
      record.name,
      record.email,
      record.street,
      record.city,
      record.state,
      record.zip_code,
      record.country,
      record.phone,
      record.created_at,
      record.updated_at,
    ];

    try {
      const result = await this.db.query<ClientRow>(queryText, values);
      return result.rows[0];
    } catch (error) {
      console.error('Error creating client:', error);
      throw translateDbError('create client', error);
    }
  }

  async findAll(userId: string): Promise<ClientRecord[]> {
    const queryText = `SELECT ${CLIENT_COLUMNS} FROM clients WHERE user_id = $1 ORDER BY created_at DESC`;
    try {
      const result = await this.db.query<ClientRow>(queryText, [userId]);
      return result.rows;
    } catch (error) {
      console.error('Error fetching clients:', error);
      throw translateDbError('fetch clients', error);
    }
  }

  async findById(id: string, userId: string): Promise<ClientRecord | null> {
    const queryText = `SELECT ${CLIENT_COLUMNS} FROM clients WHERE id = $1 AND user_id = $2`;
    try {
      const result = await this.db.query<ClientRow>(queryText, [id, userId]);
      return result.rows[0] ?? null;
    } catch (error) {
      console.error('Error fetching client by ID:', error);
      throw translateDbError('fetch client', error);
    }
  }

  async update(record: ClientRecord): Promise<ClientRecord | null> {
    const queryText = `
      UPDATE clients
      SET name = $1, email = $2, street = $3, city = $4, state = $5, zip_code = $6,
          country = $7, phone = $8, updated_at = $9
      WHERE id = $10 AND user_id = $11
      RETURNING ${CLIENT_COLUMNS}
    `;
    const values = [
      record.name,
      record.email,
      record.street,
      record.city,
      record.state,
      record.zip_code,
      record.country,
      record.phone,
      record.updated_at,
      record.id,
      record.user_id,
    ];

    try {
      const result = await this.db.query<ClientRow>(queryText, values);
      return result.rows[0] ?? null;
    } catch (error) {
      console.error('Error updating client:', error);
      throw translateDbError('update client', error);
    }
  }

  async delete(id: string, userId: string): Promise<boolean> {
    try {
      const result = await this.db.query('DELETE FROM clients WHERE id = $1 AND user_id = $2', [id, userId]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      console.error('Error deleting client:', error);
      throw translateDbError('delete client', error);
    }
  }
}
