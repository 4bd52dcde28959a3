import { ClientRecord } from '../../models/business/client.model';
import { InvoiceRecord, InvoiceRecordWithRelations, InvoiceStatus } from '../../models/financial/invoice.model';
import { LineItemRecord } from '../../models/financial/line-item.model';

/**
 * Optional filters for listing invoices.
 */
export interface InvoiceFilter {
  status?: InvoiceStatus;
  client_id?: string;
}

/**
 * Client persistence. Every operation is scoped to the owning user.
 */
export interface ClientStore {
  insert(record: ClientRecord): Promise<ClientRecord>;
  findAll(userId: string): Promise<ClientRecord[]>;
  findById(id: string, userId: string): Promise<ClientRecord | null>;
  update(record: ClientRecord): Promise<ClientRecord | null>;
  delete(id: string, userId: string): Promise<boolean>;
}

/**
 * Invoice persistence. Invoices are read back hydrated with their ordered line items
 * and the referenced client.
 */
export interface InvoiceStore {
  insert(record: InvoiceRecord, items: LineItemRecord[]): Promise<InvoiceRecordWithRelations>;
  findAll(userId: string, filter?: InvoiceFilter): Promise<InvoiceRecordWithRelations[]>;
  findById(id: string, userId: string): Promise<InvoiceRecordWithRelations | null>;
  /**
   * Writes the invoice fields. When items is given, every existing line item is
   * replaced by it within the same transaction.
   */
  update(record: InvoiceRecord, items?: LineItemRecord[]): Promise<InvoiceRecordWithRelations | null>;
  delete(id: string, userId: string): Promise<boolean>;
  countByClient(clientId: string, userId: string): Promise<number>;
}
