import { Pool, PoolClient, QueryResultRow } from 'pg';
import { ClientRecord } from '../../models/business/client.model';
import { InvoiceRecord, InvoiceRecordWithRelations } from '../../models/financial/invoice.model';
import { LineItemRecord } from '../../models/financial/line-item.model';
import { getDbClient, withTransaction } from '../../utils/database';
import { translateDbError } from './pg-error';
import { InvoiceFilter, InvoiceStore } from './store.types';

type InvoiceRow = InvoiceRecord & QueryResultRow;
type LineItemRow = LineItemRecord & QueryResultRow;
type ClientRow = ClientRecord & QueryResultRow;

const INVOICE_COLUMNS = `
  id, user_id, client_id, invoice_number, invoice_date, due_date, tax_rate::text AS tax_rate,
  status, sent_date, paid_date, created_at, updated_at
`;

const LINE_ITEM_COLUMNS = `id, invoice_id, description, quantity::text AS quantity, unit_rate::text AS unit_rate, position`;

/**
 * Postgres-backed invoice store.
 * Invoices are returned hydrated: line items ordered by position, plus the referenced client.
 *
 * @class PgInvoiceStore
 */
export class PgInvoiceStore implements InvoiceStore {
  constructor(private readonly db: Pool = getDbClient()) {}

  /**
   * Inserts the invoice and its line items in one transaction.
   */
  async insert(record: InvoiceRecord, items: LineItemRecord[]): Promise<InvoiceRecordWithRelations> {
    try {
      await withTransaction(this.db, async (client) => {
        await client.query(
          `INSERT INTO invoices (
             id, user_id, client_id, invoice_number, invoice_date, due_date, tax_rate,
             status, sent_date, paid_date, created_at, updated_at
           )
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
          [
            record.id,
            record.user_id,
            record.client_id,
            record.invoice_number,
            record.invoice_date,
            record.due_date,
            record.tax_rate,
            record.status,
            record.sent_date,
            record.paid_date,
            record.created_at,
            record.updated_at,
          ],
        );
        await this.insertLineItems(client, record.id, items);
      });
    } catch (error) {
      console.error('Error creating invoice:', error);
      throw translateDbError('create invoice', error);
    }

    const created = await this.findById(record.id, record.user_id);
    if (!created) {
      throw translateDbError('create invoice', new Error('Inserted invoice could not be read back'));
    }
    return created;
  }

  async findAll(userId: string, filter: InvoiceFilter = {}): Promise<InvoiceRecordWithRelations[]> {
    const conditions = ['user_id = $1'];
    const values: string[] = [userId];
    let paramIndex = 2;

    if (filter.status) {
      conditions.push(`status = $${paramIndex++}`);
      values.push(filter.status);
    }
    if (filter.client_id) {
      conditions.push(`client_id = $${paramIndex++}`);
      values.push(filter.client_id);
    }

    const queryText = `
      SELECT ${INVOICE_COLUMNS}
      FROM invoices
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
    `;

    try {
      const result = await this.db.query<InvoiceRow>(queryText, values);
      return await this.hydrate(result.rows, userId);
    } catch (error) {
      console.error('Error fetching invoices:', error);
      throw translateDbError('fetch invoices', error);
    }
  }

  async findById(id: string, userId: string): Promise<InvoiceRecordWithRelations | null> {
    const queryText = `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1 AND user_id = $2`;
    try {
      const result = await this.db.query<InvoiceRow>(queryText, [id, userId]);
      const [invoice] = await this.hydrate(result.rows, userId);
      return invoice ?? null;
    } catch (error) {
      console.error('Error fetching invoice by ID:', error);
      throw translateDbError('fetch invoice', error);
    }
  }

  /**
   * Writes every invoice field. Given items replace the stored ones wholesale.
   */
  async update(record: InvoiceRecord, items?: LineItemRecord[]): Promise<InvoiceRecordWithRelations | null> {
    let updated = false;
    try {
      updated = await withTransaction(this.db, async (client) => {
        const result = await client.query(
          `UPDATE invoices
           SET client_id = $1, invoice_number = $2, invoice_date = $3, due_date = $4, tax_rate = $5,
               status = $6, sent_date = $7, paid_date = $8, updated_at = $9
           WHERE id = $10 AND user_id = $11`,
          [
            record.client_id,
            record.invoice_number,
            record.invoice_date,
            record.due_date,
            record.tax_rate,
            record.status,
            record.sent_date,
            record.paid_date,
            record.updated_at,
            record.id,
            record.user_id,
          ],
        );
        if ((result.rowCount ?? 0) === 0) {
          return false;
        }

        if (items) {
          await client.query('DELETE FROM line_items WHERE invoice_id = $1', [record.id]);
          await this.insertLineItems(client, record.id, items);
        }
        return true;
      });
    } catch (error) {
      console.error('Error updating invoice:', error);
      throw translateDbError('update invoice', error);
    }

    return updated ? this.findById(record.id, record.user_id) : null;
  }

  async delete(id: string, userId: string): Promise<boolean> {
    try {
      const result = await this.db.query('DELETE FROM invoices WHERE id = $1 AND user_id = $2', [id, userId]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      console.error('Error deleting invoice:', error);
      throw translateDbError('delete invoice', error);
    }
  }

  async countByClient(clientId: string, userId: string): Promise<number> {
    try {
      const result = await this.db.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM invoices WHERE client_id = $1 AND user_id = $2',
        [clientId, userId],
      );
      return Number(result.rows[0]?.count ?? 0);
    } catch (error) {
      console.error('Error counting client invoices:', error);
      throw translateDbError('count client invoices', error);
    }
  }

  private async insertLineItems(client: PoolClient, invoiceId: string, items: LineItemRecord[]): Promise<void> {
    for (const [index, item] of items.entries()) {
      await client.query(
        `INSERT INTO line_items (id, invoice_id, description, quantity, unit_rate, position)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [item.id, invoiceId, item.description, item.quantity, item.unit_rate, item.position ?? index],
      );
    }
  }

  /**
   * Attaches line items and clients to invoice rows with one query each.
   */
  private async hydrate(rows: InvoiceRow[], userId: string): Promise<InvoiceRecordWithRelations[]> {
    if (rows.length === 0) {
      return [];
    }

    const invoiceIds = rows.map((row) => row.id);
    const clientIds = [...new Set(rows.map((row) => row.client_id))];

    const itemsResult = await this.db.query<LineItemRow>(
      `SELECT ${LINE_ITEM_COLUMNS} FROM line_items WHERE invoice_id = ANY($1) ORDER BY position ASC`,
      [invoiceIds],
    );
    const clientsResult = await this.db.query<ClientRow>(
      `SELECT id, user_id, name, email, street, city, state, zip_code, country, phone, created_at, updated_at
       FROM clients WHERE id = ANY($1) AND user_id = $2`,
      [clientIds, userId],
    );

    const clientsById = new Map(clientsResult.rows.map((client) => [client.id, client]));
    return rows.map((row) => ({
      ...row,
      line_items: itemsResult.rows.filter((item) => item.invoice_id === row.id),
      client: clientsById.get(row.client_id) ?? null,
    }));
  }
}
