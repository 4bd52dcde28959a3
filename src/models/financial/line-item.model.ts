import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { DecimalInput, parseDecimal } from '../../utils/decimal';
import { ValidationError } from '../../utils/errors';
import { requireText } from '../../utils/validation';

/**
 * Line item fields accepted when creating an item.
 * quantity and unit_rate are decimal strings at the API boundary.
 *
 * @example
 * const input: LineItemInput = {
 *   description: 'Web Development',
 *   quantity: '40',
 *   unit_rate: '150.00'
 * };
 */
export interface LineItemInput {
  id?: string;
  invoice_id?: string | null;
  description: string;
  quantity: DecimalInput;
  unit_rate: DecimalInput;
}

/**
 * Line item row as persisted in the line_items table.
 * position preserves insertion order within the invoice.
 */
export interface LineItemRecord {
  id: string;
  invoice_id: string | null;
  description: string;
  quantity: string;
  unit_rate: string;
  position?: number;
}

/**
 * Line item as returned to API consumers, including the derived amount.
 */
export interface LineItemView extends LineItemRecord {
  amount: string;
}

/**
 * A single billable entry: amount = quantity × unit rate, in exact decimal arithmetic.
 * Immutable once created, apart from the owning invoice reference.
 */
export class LineItem {
  readonly id: string;
  readonly description: string;
  readonly quantity: Decimal;
  readonly unitRate: Decimal;
  private owningInvoiceId: string | null;

  private constructor(id: string, invoiceId: string | null, description: string, quantity: Decimal, unitRate: Decimal) {
    this.id = id;
    this.owningInvoiceId = invoiceId;
    this.description = description;
    this.quantity = quantity;
    this.unitRate = unitRate;
  }

  /**
   * Validates and builds a line item. A new id is generated unless one is supplied.
   *
   * @throws {ValidationError} When description is empty, or quantity or unit_rate is not > 0
   */
  static create(input: LineItemInput): LineItem {
    const errors: string[] = [];
    const description = requireText(input.description, 'description', errors);
    const quantity = parsePositive(input.quantity, 'quantity', errors);
    const unitRate = parsePositive(input.unit_rate, 'unit_rate', errors);

    if (errors.length > 0 || !quantity || !unitRate) {
      throw new ValidationError(`Invalid line item: ${errors.join(', ')}`, errors);
    }

    return new LineItem(input.id ?? uuidv4(), input.invoice_id ?? null, description, quantity, unitRate);
  }

  static fromRecord(record: LineItemRecord): LineItem {
    return LineItem.create(record);
  }

  get invoiceId(): string | null {
    return this.owningInvoiceId;
  }

  assignTo(invoiceId: string | null): void {
    this.owningInvoiceId = invoiceId;
  }

  amount(): Decimal {
    return this.quantity.times(this.unitRate);
  }

  toRecord(position?: number): LineItemRecord {
    return {
      id: this.id,
      invoice_id: this.owningInvoiceId,
      description: this.description,
      quantity: this.quantity.toString(),
      unit_rate: this.unitRate.toString(),
      ...(position !== undefined ? { position } : {}),
    };
  }

  toView(): LineItemView {
    return { ...this.toRecord(), amount: this.amount().toString() };
  }
}

function parsePositive(value: DecimalInput, field: string, errors: string[]): Decimal | null {
  try {
    const parsed = parseDecimal(value, field);
    if (parsed.lte(0)) {
      errors.push(`${field} must be greater than 0`);
      return null;
    }
    return parsed;
  } catch (error) {
    if (error instanceof ValidationError) {
      errors.push(error.message);
      return null;
    }
    throw error;
  }
}
