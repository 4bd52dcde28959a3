// Invoice-related models

import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { Client, ClientRecord } from '../business/client.model';
import { LineItem, LineItemInput, LineItemRecord, LineItemView } from './line-item.model';
import { DecimalInput, ExactDecimal, parseDecimal, sumDecimals, TAX_RATE_LIMITS } from '../../utils/decimal';
import { calendarDayIn, formatCalendarDate, toCalendarDate } from '../../utils/date';
import { ValidationError } from '../../utils/errors';
import { requireText } from '../../utils/validation';

/**
 * Valid status values for an invoice.
 * Tracks the invoice lifecycle from draft to payment.
 */
export const INVOICE_STATUSES = ['draft', 'sent', 'paid', 'overdue'] as const;

export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export function isInvoiceStatus(value: string): value is InvoiceStatus {
  return INVOICE_STATUSES.some((status) => status === value);
}

/**
 * Data transfer object for creating a new invoice.
 * Financial totals are never supplied: they are derived from the line items.
 *
 * @interface CreateInvoiceDto
 * @property {string} client_id - The UUID of the client being invoiced (foreign key)
 * @property {string} invoice_number - Invoice number, intended unique per user
 * @property {DecimalInput} [tax_rate] - Tax rate in percent, 0–100 (defaults to 0)
 * @property {LineItemInput[]} line_items - At least one line item
 *
 * @example
 * const newInvoice: CreateInvoiceDto = {
 *   client_id: 'client-uuid',
 *   invoice_number: 'INV-2024-001',
 *   invoice_date: '2024-01-15',
 *   due_date: '2024-02-15',
 *   tax_rate: '8.5',
 *   line_items: [{ description: 'Web Development', quantity: '40', unit_rate: '150' }]
 * };
 */
export interface CreateInvoiceDto {
  client_id: string;
  invoice_number: string;
  invoice_date: Date | string;
  due_date: Date | string;
  tax_rate?: DecimalInput;
  line_items: LineItemInput[];
}

/**
 * Data transfer object for updating an existing invoice.
 * All fields are optional; line_items, when present, replaces every existing item.
 *
 * @example
 * const updateData: UpdateInvoiceDto = {
 *   tax_rate: '10',
 *   line_items: [{ description: 'Updated Service', quantity: '5', unit_rate: '200' }]
 * };
 */
export interface UpdateInvoiceDto extends Partial<CreateInvoiceDto> {
  status?: InvoiceStatus;
}

/**
 * Invoice row as stored in the invoices table.
 * Calendar dates are 'YYYY-MM-DD' strings and the tax rate a decimal string,
 * exactly as the database returns them.
 */
export interface InvoiceRecord {
  id: string;
  user_id: string;
  client_id: string;
  invoice_number: string;
  invoice_date: string;
  due_date: string;
  tax_rate: string;
  status: InvoiceStatus;
  sent_date: Date | null;
  paid_date: Date | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Invoice row hydrated with its line items and (optionally) the referenced client.
 */
export interface InvoiceRecordWithRelations extends InvoiceRecord {
  line_items: LineItemRecord[];
  client: ClientRecord | null;
}

/**
 * Full invoice structure returned by API endpoints, including derived totals as decimal strings.
 */
export interface InvoiceView extends InvoiceRecord {
  line_items: LineItemView[];
  client: ClientRecord | null;
  subtotal: string;
  tax: string;
  total: string;
}

export interface OverdueCheckOptions {
  timezone?: string;
  now?: Date;
}

interface InvoiceState {
  clientId: string;
  invoiceNumber: string;
  invoiceDate: Date;
  dueDate: Date;
  taxRate: Decimal;
  status: InvoiceStatus;
  sentDate: Date | null;
  paidDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const HUNDRED = new ExactDecimal(100);

/**
 * Invoice aggregate root.
 * Owns its ordered line items, holds a non-owning reference to a client,
 * and tracks the draft → sent → paid lifecycle (with overdue reached from sent).
 * Subtotal, tax and total are recomputed from the live line items on every call.
 */
export class Invoice {
  readonly id: string;
  readonly userId: string;
  private state: InvoiceState;
  private items: LineItem[];
  private attachedClient: Client | null;

  private constructor(id: string, userId: string, state: InvoiceState, items: LineItem[], client: Client | null) {
    this.id = id;
    this.userId = userId;
    this.state = state;
    this.items = items;
    this.attachedClient = client;
    for (const item of items) {
      item.assignTo(id);
    }
  }

  /**
   * Validates and builds a new draft invoice.
   *
   * @throws {ValidationError} When line_items is empty, due_date < invoice_date,
   * the tax rate is outside [0, 100], the invoice number is blank, or any line item is invalid
   */
  static create(userId: string, dto: CreateInvoiceDto, now: Date = new Date()): Invoice {
    const errors: string[] = [];
    const clientId = requireText(dto.client_id, 'client_id', errors);
    const invoiceNumber = requireText(dto.invoice_number, 'invoice_number', errors);
    const taxRate = collect(errors, () => parseTaxRate(dto.tax_rate ?? '0'));
    const invoiceDate = collect(errors, () => toCalendarDate(dto.invoice_date, 'invoice_date'));
    const dueDate = collect(errors, () => toCalendarDate(dto.due_date, 'due_date'));
    const items = collect(errors, () => buildLineItems(dto.line_items));

    if (invoiceDate && dueDate && dueDate.getTime() < invoiceDate.getTime()) {
      errors.push('Due date cannot be before invoice date');
    }

    if (errors.length > 0 || !taxRate || !invoiceDate || !dueDate || !items) {
      throw new ValidationError(`Invalid invoice: ${errors.join(', ')}`, errors);
    }

    const state: InvoiceState = {
      clientId,
      invoiceNumber,
      invoiceDate,
      dueDate,
      taxRate,
      status: 'draft',
      sentDate: null,
      paidDate: null,
      createdAt: now,
      updatedAt: now,
    };
    return new Invoice(uuidv4(), userId, state, items, null);
  }

  /**
   * Rebuilds the aggregate from persisted rows, re-checking its invariants.
   */
  static fromRecord(record: InvoiceRecordWithRelations): Invoice {
    const items = buildLineItems(
      [...record.line_items].sort((a, b) => (a.position ?? 0) - (b.position ?? 0)),
    );
    const invoiceDate = toCalendarDate(record.invoice_date, 'invoice_date');
    const dueDate = toCalendarDate(record.due_date, 'due_date');
    assertDateOrder(invoiceDate, dueDate);

    const state: InvoiceState = {
      clientId: record.client_id,
      invoiceNumber: record.invoice_number,
      invoiceDate,
      dueDate,
      taxRate: parseTaxRate(record.tax_rate),
      status: record.status,
      sentDate: record.sent_date,
      paidDate: record.paid_date,
      createdAt: record.created_at,
      updatedAt: record.updated_at,
    };
    const client = record.client ? Client.fromRecord(record.client) : null;
    return new Invoice(record.id, record.user_id, state, items, client);
  }

  get clientId(): string {
    return this.state.clientId;
  }

  get invoiceNumber(): string {
    return this.state.invoiceNumber;
  }

  get invoiceDate(): Date {
    return this.state.invoiceDate;
  }

  get dueDate(): Date {
    return this.state.dueDate;
  }

  get taxRate(): Decimal {
    return this.state.taxRate;
  }

  get status(): InvoiceStatus {
    return this.state.status;
  }

  get sentDate(): Date | null {
    return this.state.sentDate;
  }

  get paidDate(): Date | null {
    return this.state.paidDate;
  }

  get createdAt(): Date {
    return this.state.createdAt;
  }

  get updatedAt(): Date {
    return this.state.updatedAt;
  }

  get lineItems(): ReadonlyArray<LineItem> {
    return [...this.items];
  }

  get client(): Client | null {
    return this.attachedClient;
  }

  subtotal(): Decimal {
    return sumDecimals(this.items.map((item) => item.amount()));
  }

  tax(): Decimal {
    return this.subtotal().times(this.state.taxRate.dividedBy(HUNDRED));
  }

  total(): Decimal {
    return this.subtotal().plus(this.tax());
  }

  /**
   * Attaches a resolved client snapshot. It must be the client the invoice references.
   */
  attachClient(client: Client): void {
    if (client.id !== this.state.clientId) {
      throw new ValidationError('Attached client does not match the invoice client_id');
    }
    this.attachedClient = client;
  }

  addLineItem(item: LineItem, now: Date = new Date()): void {
    item.assignTo(this.id);
    this.items.push(item);
    this.touch(now);
  }

  /**
   * Removes a line item by id. Unknown ids are ignored.
   *
   * @throws {ValidationError} If the item is the last one left
   */
  removeLineItem(itemId: string, now: Date = new Date()): void {
    const remaining = this.items.filter((item) => item.id !== itemId);
    if (remaining.length === 0) {
      throw new ValidationError('At least one line item is required');
    }
    for (const item of this.items) {
      if (item.id === itemId) item.assignTo(null);
    }
    this.items = remaining;
    this.touch(now);
  }

  /**
   * Discards every current line item and inserts the given ones, in order.
   *
   * @throws {ValidationError} If the new set is empty
   */
  replaceLineItems(items: LineItem[], now: Date = new Date()): void {
    if (items.length === 0) {
      throw new ValidationError('At least one line item is required');
    }
    for (const item of this.items) {
      item.assignTo(null);
    }
    for (const item of items) {
      item.assignTo(this.id);
    }
    this.items = [...items];
    this.touch(now);
  }

  /**
   * Applies a partial update. Nothing changes unless every supplied field is valid.
   * Dates are checked on their merged values; status goes through the lifecycle rules.
   *
   * @throws {ValidationError} On any invalid field or a forbidden status transition
   */
  update(patch: UpdateInvoiceDto, now: Date = new Date()): void {
    const errors: string[] = [];
    const next: InvoiceState = { ...this.state };

    if (patch.client_id !== undefined) {
      next.clientId = requireText(patch.client_id, 'client_id', errors);
    }
    if (patch.invoice_number !== undefined) {
      next.invoiceNumber = requireText(patch.invoice_number, 'invoice_number', errors);
    }
    if (patch.tax_rate !== undefined) {
      const taxRate = collect(errors, () => parseTaxRate(patch.tax_rate ?? '0'));
      if (taxRate) next.taxRate = taxRate;
    }
    if (patch.invoice_date !== undefined) {
      const invoiceDate = collect(errors, () => toCalendarDate(patch.invoice_date ?? '', 'invoice_date'));
      if (invoiceDate) next.invoiceDate = invoiceDate;
    }
    if (patch.due_date !== undefined) {
      const dueDate = collect(errors, () => toCalendarDate(patch.due_date ?? '', 'due_date'));
      if (dueDate) next.dueDate = dueDate;
    }
    if (next.dueDate.getTime() < next.invoiceDate.getTime()) {
      errors.push('Due date cannot be before invoice date');
    }
    const items = patch.line_items !== undefined
      ? collect(errors, () => buildLineItems(patch.line_items ?? []))
      : null;
    if (patch.status !== undefined) {
      collect(errors, () => assertTransition(this.state.status, patch.status ?? this.state.status));
    }

    if (errors.length > 0) {
      throw new ValidationError(`Invalid invoice update: ${errors.join(', ')}`, errors);
    }

    if (next.clientId !== this.state.clientId) {
      this.attachedClient = null;
    }
    this.state = next;
    if (items) {
      this.replaceLineItems(items, now);
    }
    if (patch.status !== undefined) {
      this.updateStatus(patch.status, now);
    }
    this.touch(now);
  }

  /**
   * Moves the invoice to the requested status.
   * sent_date and paid_date are set the first time the invoice is marked sent or paid
   * and never overwritten afterwards.
   *
   * @throws {ValidationError} On a return to draft, or a direct move to overdue
   */
  updateStatus(status: InvoiceStatus, now: Date = new Date()): void {
    assertTransition(this.state.status, status);

    this.state.status = status;
    if (status === 'sent' && !this.state.sentDate) {
      this.state.sentDate = now;
    }
    if (status === 'paid' && !this.state.paidDate) {
      this.state.paidDate = now;
    }
    this.touch(now);
  }

  /**
   * Marks a sent invoice overdue when today (in the given time zone) is past the due date.
   * Any other status is left untouched.
   *
   * @returns Whether the invoice became overdue
   */
  checkOverdue(options: OverdueCheckOptions = {}): boolean {
    const now = options.now ?? new Date();
    if (this.state.status !== 'sent') {
      return false;
    }

    const today = calendarDayIn(options.timezone ?? 'UTC', now);
    if (today <= formatCalendarDate(this.state.dueDate)) {
      return false;
    }

    this.state.status = 'overdue';
    this.touch(now);
    return true;
  }

  toRecord(): InvoiceRecord {
    return {
      id: this.id,
      user_id: this.userId,
      client_id: this.state.clientId,
      invoice_number: this.state.invoiceNumber,
      invoice_date: formatCalendarDate(this.state.invoiceDate),
      due_date: formatCalendarDate(this.state.dueDate),
      tax_rate: this.state.taxRate.toString(),
      status: this.state.status,
      sent_date: this.state.sentDate,
      paid_date: this.state.paidDate,
      created_at: this.state.createdAt,
      updated_at: this.state.updatedAt,
    };
  }

  lineItemRecords(): LineItemRecord[] {
    return this.items.map((item, index) => item.toRecord(index));
  }

  toView(): InvoiceView {
    return {
      ...this.toRecord(),
      line_items: this.items.map((item) => item.toView()),
      client: this.attachedClient ? this.attachedClient.toRecord() : null,
      subtotal: this.subtotal().toString(),
      tax: this.tax().toString(),
      total: this.total().toString(),
    };
  }

  private touch(now: Date): void {
    this.state.updatedAt = now;
  }
}

function parseTaxRate(value: DecimalInput): Decimal {
  const taxRate = parseDecimal(value, 'tax_rate', TAX_RATE_LIMITS);
  if (taxRate.lt(0) || taxRate.gt(100)) {
    throw new ValidationError('tax_rate must be between 0 and 100');
  }
  return taxRate;
}

function buildLineItems(inputs: LineItemInput[]): LineItem[] {
  if (inputs.length === 0) {
    throw new ValidationError('At least one line item is required');
  }

  const errors: string[] = [];
  const items: LineItem[] = [];
  inputs.forEach((input, index) => {
    try {
      items.push(LineItem.create(input));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const details = error.details ?? [error.message];
      errors.push(...details.map((detail) => `line_items[${index}].${detail}`));
    }
  });

  if (errors.length > 0) {
    throw new ValidationError(`Invalid line items: ${errors.join(', ')}`, errors);
  }
  return items;
}

function assertDateOrder(invoiceDate: Date, dueDate: Date): void {
  if (dueDate.getTime() < invoiceDate.getTime()) {
    throw new ValidationError('Due date cannot be before invoice date');
  }
}

function assertTransition(from: InvoiceStatus, to: InvoiceStatus): void {
  if (to === 'draft' && from !== 'draft') {
    throw new ValidationError(`An invoice cannot return to draft once ${from}`);
  }
  if (to === 'overdue' && from !== 'overdue') {
    throw new ValidationError('An invoice becomes overdue only through an overdue check');
  }
}

/**
 * Runs a validating step, turning a ValidationError into collected messages.
 */
function collect<T>(errors: string[], step: () => T): T | null {
  try {
    return step();
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    errors.push(...(error.details ?? [error.message]));
    return null;
  }
}
