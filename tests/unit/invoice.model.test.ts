import { Invoice } from '../../src/models/financial/invoice.model';
import { LineItem, LineItemInput } from '../../src/models/financial/line-item.model';
import { formatCalendarDate } from '../../src/utils/date';
import { ValidationError } from '../../src/utils/errors';
import { buildClient, buildInvoice, buildInvoiceDto, CREATED_AT, LATER } from '../helpers/fixtures';
import { TEST_USER_ID } from '../setup';

function captureError(action: () => unknown): ValidationError {
  try {
    action();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('Invoice', () => {
  describe('create', () => {
    it('should start as a draft without sent or paid dates', () => {
      const invoice = buildInvoice();

      expect(invoice.status).toBe('draft');
      expect(invoice.sentDate).toBeNull();
      expect(invoice.paidDate).toBeNull();
      expect(invoice.userId).toBe(TEST_USER_ID);
      expect(invoice.createdAt).toEqual(CREATED_AT);
      expect(invoice.updatedAt).toEqual(CREATED_AT);
    });

    it('should store calendar dates and assign its line items', () => {
      const invoice = buildInvoice();
      const record = invoice.toRecord();

      expect(record.invoice_date).toBe('2024-01-15');
      expect(record.due_date).toBe('2024-02-15');
      expect(invoice.lineItems.map((item) => item.invoiceId)).toEqual([invoice.id, invoice.id]);
    });

    it('should default the tax rate to 0', () => {
      const invoice = buildInvoice({ tax_rate: undefined });

      expect(invoice.taxRate.toString()).toBe('0');
      expect(invoice.tax().toString()).toBe('0');
      expect(invoice.total().toString()).toBe('600');
    });

    it('should accept a due date equal to the invoice date', () => {
      const invoice = buildInvoice({ invoice_date: '2024-03-01', due_date: '2024-03-01' });
      expect(formatCalendarDate(invoice.dueDate)).toBe('2024-03-01');
    });

    it('should reject an empty line item list', () => {
      expect(() => buildInvoice({ line_items: [] })).toThrow('Invalid invoice: At least one line item is required');
    });

    it('should reject a due date before the invoice date', () => {
      expect(() => buildInvoice({ invoice_date: '2024-02-15', due_date: '2024-02-14' })).toThrow(
        'Invalid invoice: Due date cannot be before invoice date',
      );
    });

    it('should name the failing line item', () => {
      const error = captureError(() =>
        buildInvoice({
          line_items: [
            { description: 'Design work', quantity: '2', unit_rate: '150' },
            { description: 'Consulting', quantity: '0', unit_rate: '100' },
          ],
        }),
      );

      expect(error.details).toEqual(['line_items[1].quantity must be greater than 0']);
    });

    it('should reject a tax rate above 100', () => {
      expect(() => buildInvoice({ tax_rate: '101' })).toThrow('Invalid invoice: tax_rate must be between 0 and 100');
    });

    it('should reject a tax rate with more than four decimal places', () => {
      expect(() => buildInvoice({ tax_rate: '8.12345' })).toThrow(
        'Invalid invoice: tax_rate must have at most 4 decimal places',
      );
    });

    it('should reject an impossible calendar date', () => {
      const error = captureError(() => buildInvoice({ invoice_date: '2024-02-30' }));
      expect(error.details).toEqual(['invoice_date must be a valid date']);
    });

    it('should reject a blank invoice number', () => {
      expect(() => buildInvoice({ invoice_number: '  ' })).toThrow('Invalid invoice: invoice_number is required');
    });
  });

  describe('totals', () => {
    it('should compute subtotal, tax and total from the line items', () => {
      const invoice = buildInvoice();

      expect(invoice.subtotal().toString()).toBe('600');
      expect(invoice.tax().toString()).toBe('60');
      expect(invoice.total().toString()).toBe('660');
    });

    it('should keep fractional tax exact', () => {
      const invoice = buildInvoice({
        tax_rate: '8.5',
        line_items: [
          { description: 'Web Development', quantity: '40', unit_rate: '150' },
          { description: 'Consulting', quantity: '20', unit_rate: '100' },
        ],
      });

      expect(invoice.subtotal().toString()).toBe('8000');
      expect(invoice.tax().toString()).toBe('680');
      expect(invoice.total().toString()).toBe('8680');
    });

    it('should handle a single line item', () => {
      const invoice = buildInvoice({
        tax_rate: '0',
        line_items: [{ description: 'Audit', quantity: '1', unit_rate: '99.99' }],
      });

      expect(invoice.total().toString()).toBe('99.99');
      expect(invoice.total().equals(invoice.subtotal().plus(invoice.tax()))).toBe(true);
    });

    it('should stay exact across fifty line items', () => {
      const lineItems: LineItemInput[] = Array.from({ length: 50 }, (_, index) => ({
        description: `Item ${index + 1}`,
        quantity: '1.5',
        unit_rate: '19.99',
      }));
      const invoice = buildInvoice({ tax_rate: '7.25', line_items: lineItems });

      expect(invoice.lineItems).toHaveLength(50);
      expect(invoice.subtotal().toString()).toBe('1499.25');
      expect(invoice.tax().toString()).toBe('108.695625');
      expect(invoice.total().toString()).toBe('1607.945625');
      expect(invoice.tax().equals(invoice.subtotal().times(invoice.taxRate).dividedBy(100))).toBe(true);
      expect(invoice.total().equals(invoice.subtotal().plus(invoice.tax()))).toBe(true);
    });
  });

  describe('line items', () => {
    it('should raise the subtotal by exactly the added amount', () => {
      const invoice = buildInvoice();
      const item = LineItem.create({ description: 'Hosting', quantity: '1', unit_rate: '50.5' });

      invoice.addLineItem(item, LATER);

      expect(invoice.subtotal().toString()).toBe('650.5');
      expect(item.invoiceId).toBe(invoice.id);
      expect(invoice.updatedAt).toEqual(LATER);
    });

    it('should lower the subtotal by exactly the removed amount', () => {
      const invoice = buildInvoice();
      const [first] = invoice.lineItems;

      invoice.removeLineItem(first.id, LATER);

      expect(invoice.lineItems).toHaveLength(1);
      expect(invoice.subtotal().toString()).toBe('300');
      expect(first.invoiceId).toBeNull();
      expect(invoice.updatedAt).toEqual(LATER);
    });

    it('should ignore an unknown id but still refresh the update timestamp', () => {
      const invoice = buildInvoice();

      invoice.removeLineItem('00000000-0000-4000-8000-000000000000', LATER);

      expect(invoice.lineItems).toHaveLength(2);
      expect(invoice.updatedAt).toEqual(LATER);
    });

    it('should refuse to remove the last line item', () => {
      const invoice = buildInvoice({ line_items: [{ description: 'Audit', quantity: '1', unit_rate: '100' }] });
      const [only] = invoice.lineItems;

      expect(() => invoice.removeLineItem(only.id, LATER)).toThrow('At least one line item is required');
      expect(invoice.lineItems).toHaveLength(1);
    });

    it('should return a copy of the line item list', () => {
      const invoice = buildInvoice();
      const items = [...invoice.lineItems];
      items.pop();

      expect(invoice.lineItems).toHaveLength(2);
    });
  });

  describe('update', () => {
    it('should replace the line items wholesale', () => {
      const invoice = buildInvoice();

      invoice.update({ line_items: [{ description: 'Retainer', quantity: '5', unit_rate: '200' }] }, LATER);

      expect(invoice.lineItems.map((item) => item.description)).toEqual(['Retainer']);
      expect(invoice.subtotal().toString()).toBe('1000');
      expect(invoice.total().toString()).toBe('1100');
      expect(invoice.updatedAt).toEqual(LATER);
    });

    it('should reject an empty replacement and keep the current items', () => {
      const invoice = buildInvoice();

      expect(() => invoice.update({ line_items: [] }, LATER)).toThrow('At least one line item is required');
      expect(invoice.lineItems).toHaveLength(2);
      expect(invoice.updatedAt).toEqual(CREATED_AT);
    });

    it('should check date order on the merged dates', () => {
      const invoice = buildInvoice();

      expect(() => invoice.update({ due_date: '2024-01-10' }, LATER)).toThrow(
        'Invalid invoice update: Due date cannot be before invoice date',
      );
      expect(invoice.toRecord().due_date).toBe('2024-02-15');
    });

    it('should apply nothing when one field is invalid', () => {
      const invoice = buildInvoice();

      expect(() => invoice.update({ invoice_number: 'INV-2024-009', tax_rate: '-1' }, LATER)).toThrow(ValidationError);
      expect(invoice.invoiceNumber).toBe('INV-2024-001');
      expect(invoice.taxRate.toString()).toBe('10');
    });

    it('should update scalar fields', () => {
      const invoice = buildInvoice();

      invoice.update({ invoice_number: 'INV-2024-002', tax_rate: '8.50', due_date: '2024-03-01' }, LATER);

      const record = invoice.toRecord();
      expect(record.invoice_number).toBe('INV-2024-002');
      expect(record.tax_rate).toBe('8.5');
      expect(record.due_date).toBe('2024-03-01');
      expect(record.updated_at).toEqual(LATER);
    });

    it('should drop the attached client when the client reference changes', () => {
      const invoice = buildInvoice();

      invoice.update({ client_id: 'b1e2c3d4-5f6a-4b7c-8d9e-0f1a2b3c4d5e' }, LATER);

      expect(invoice.clientId).toBe('b1e2c3d4-5f6a-4b7c-8d9e-0f1a2b3c4d5e');
      expect(invoice.client).toBeNull();
    });
  });

  describe('client reference', () => {
    it('should refuse a client other than the referenced one', () => {
      const invoice = buildInvoice();
      const stranger = buildClient({ name: 'Globex' });

      expect(() => invoice.attachClient(stranger)).toThrow('Attached client does not match the invoice client_id');
    });
  });

  describe('records', () => {
    it('should rebuild items in position order', () => {
      const invoice = buildInvoice();
      const rebuilt = Invoice.fromRecord({
        ...invoice.toRecord(),
        line_items: invoice.lineItemRecords().reverse(),
        client: null,
      });

      expect(rebuilt.lineItems.map((item) => item.description)).toEqual(['Design work', 'Consulting']);
      expect(rebuilt.total().toString()).toBe('660');
    });

    it('should expose totals and line item amounts in the view', () => {
      const view = buildInvoice().toView();

      expect(view.line_items.map((item) => item.amount)).toEqual(['300', '300']);
      expect(view.subtotal).toBe('600');
      expect(view.tax).toBe('60');
      expect(view.total).toBe('660');
      expect(view.tax_rate).toBe('10');
      expect(view.client?.name).toBe('Acme Corporation');
    });

    it('should build the same invoice from a DTO with Date values', () => {
      const client = buildClient();
      const invoice = Invoice.create(
        TEST_USER_ID,
        buildInvoiceDto(client.id, {
          invoice_date: new Date('2024-01-15T00:00:00.000Z'),
          due_date: new Date('2024-02-15T00:00:00.000Z'),
        }),
        CREATED_AT,
      );

      expect(invoice.toRecord().invoice_date).toBe('2024-01-15');
      expect(invoice.toRecord().due_date).toBe('2024-02-15');
    });
  });
});
