import { Client } from '../../models/business/client.model';
import {
  CreateInvoiceDto,
  Invoice,
  InvoiceRecordWithRelations,
  InvoiceView,
  UpdateInvoiceDto,
} from '../../models/financial/invoice.model';
import { NotFoundError } from '../../utils/errors';
import { ClientStore, InvoiceFilter, InvoiceStore } from '../persistence/store.types';
import { InvoicePdfService, pdfFilename } from './invoice-pdf.service';

/**
 * A rendered invoice document ready to be sent as an attachment.
 */
export interface InvoicePdf {
  filename: string;
  content: Buffer;
}

export interface InvoiceServiceOptions {
  /** IANA zone deciding the current calendar day for overdue checks */
  timezone?: string;
  clock?: () => Date;
}

/**
 * Service for managing invoices and their line items.
 * Loads the Invoice aggregate, lets it enforce its invariants and lifecycle,
 * and writes it back. Totals are always derived by the aggregate, never stored.
 *
 * @class InvoiceService
 */
export class InvoiceService {
  private readonly timezone: string;
  private readonly clock: () => Date;

  constructor(
    private readonly invoices: InvoiceStore,
    private readonly clients: ClientStore,
    private readonly pdfService: InvoicePdfService = new InvoicePdfService(),
    options: InvoiceServiceOptions = {},
  ) {
    this.timezone = options.timezone ?? 'UTC';
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Creates a draft invoice for one of the user's clients.
   *
   * @throws {NotFoundError} If the client does not exist for this user
   * @throws {ValidationError} If the invoice or any line item is invalid
   *
   * @example
   * const invoice = await invoiceService.create(userId, {
   *   client_id: clientId,
   *   invoice_number: 'INV-2024-001',
   *   invoice_date: '2024-01-15',
   *   due_date: '2024-02-15',
   *   tax_rate: '8.5',
   *   line_items: [{ description: 'Web Development', quantity: '40', unit_rate: '150' }]
   * });
   * console.log(invoice.total); // '6510'
   */
  async create(userId: string, dto: CreateInvoiceDto): Promise<InvoiceView> {
    const client = await this.requireClient(dto.client_id, userId);

    const invoice = Invoice.create(userId, dto, this.clock());
    invoice.attachClient(client);

    const stored = await this.invoices.insert(invoice.toRecord(), invoice.lineItemRecords());
    return Invoice.fromRecord(stored).toView();
  }

  /**
   * Lists the user's invoices, newest first, optionally filtered by status and client.
   */
  async findAll(userId: string, filter: InvoiceFilter = {}): Promise<InvoiceView[]> {
    const records = await this.invoices.findAll(userId, filter);
    return records.map((record) => Invoice.fromRecord(record).toView());
  }

  /**
   * @throws {NotFoundError} If the invoice does not exist for this user
   */
  async findById(id: string, userId: string): Promise<InvoiceView> {
    const invoice = await this.load(id, userId);
    return invoice.toView();
  }

  /**
   * Applies a partial update. A line_items list replaces every existing item.
   *
   * @throws {ValidationError} On an invalid field, an empty line_items list or a forbidden status change
   * @throws {NotFoundError} If the invoice, or a newly referenced client, does not exist for this user
   */
  async update(id: string, userId: string, patch: UpdateInvoiceDto): Promise<InvoiceView> {
    const invoice = await this.load(id, userId);
    const clientChanged = patch.client_id !== undefined && patch.client_id !== invoice.clientId;
    const newClient = clientChanged && patch.client_id
      ? await this.requireClient(patch.client_id, userId)
      : null;

    invoice.update(patch, this.clock());
    if (newClient) {
      invoice.attachClient(newClient);
    }

    return this.save(invoice, patch.line_items !== undefined);
  }

  /**
   * Marks the invoice sent. The first call records sent_date.
   */
  async markSent(id: string, userId: string): Promise<InvoiceView> {
    const invoice = await this.load(id, userId);
    invoice.updateStatus('sent', this.clock());
    return this.save(invoice, false);
  }

  /**
   * Marks the invoice paid. The first call records paid_date.
   */
  async markPaid(id: string, userId: string): Promise<InvoiceView> {
    const invoice = await this.load(id, userId);
    invoice.updateStatus('paid', this.clock());
    return this.save(invoice, false);
  }

  /**
   * Moves a sent invoice past its due date to overdue. Other invoices are returned unchanged.
   */
  async checkOverdue(id: string, userId: string): Promise<InvoiceView> {
    const invoice = await this.load(id, userId);
    const becameOverdue = invoice.checkOverdue({ timezone: this.timezone, now: this.clock() });
    return becameOverdue ? this.save(invoice, false) : invoice.toView();
  }

  /**
   * Deletes the invoice; its line items are removed with it.
   *
   * @throws {NotFoundError} If the invoice does not exist for this user
   */
  async delete(id: string, userId: string): Promise<void> {
    const deleted = await this.invoices.delete(id, userId);
    if (!deleted) {
      throw new NotFoundError('Invoice');
    }
  }

  /**
   * Renders the invoice, with its client's bill-to block, as a PDF attachment.
   *
   * @throws {RenderError} If rendering fails
   */
  async exportPdf(id: string, userId: string): Promise<InvoicePdf> {
    const invoice = await this.load(id, userId);
    const content = await this.pdfService.export(invoice);
    return { filename: pdfFilename(invoice), content };
  }

  private async load(id: string, userId: string): Promise<Invoice> {
    const record = await this.invoices.findById(id, userId);
    if (!record) {
      throw new NotFoundError('Invoice');
    }
    return Invoice.fromRecord(record);
  }

  private async requireClient(clientId: string, userId: string): Promise<Client> {
    const record = await this.clients.findById(clientId, userId);
    if (!record) {
      throw new NotFoundError('Client');
    }
    return Client.fromRecord(record);
  }

  private async save(invoice: Invoice, withItems: boolean): Promise<InvoiceView> {
    const stored: InvoiceRecordWithRelations | null = await this.invoices.update(
      invoice.toRecord(),
      withItems ? invoice.lineItemRecords() : undefined,
    );
    if (!stored) {
      throw new NotFoundError('Invoice');
    }
    return Invoice.fromRecord(stored).toView();
  }
}
