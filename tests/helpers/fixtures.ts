/**
 * Fixture builders shared by the unit tests.
 */

import { Client, CreateClientDto } from '../../src/models/business/client.model';
import { CreateInvoiceDto, Invoice } from '../../src/models/financial/invoice.model';
import { TEST_USER_ID } from '../setup';

export const CREATED_AT = new Date('2024-01-15T09:00:00.000Z');
export const LATER = new Date('2024-01-16T14:30:00.000Z');

export function buildClientDto(overrides: Partial<CreateClientDto> = {}): CreateClientDto {
  return {
    name: 'Acme Corporation',
    email: 'billing@acme.test',
    street: '123 Main St',
    city: 'San Francisco',
    state: 'CA',
    zip_code: '94102',
    country: 'USA',
    phone: '+1-555-0100',
    ...overrides,
  };
}

export function buildClient(overrides: Partial<CreateClientDto> = {}): Client {
  return Client.create(TEST_USER_ID, buildClientDto(overrides), CREATED_AT);
}

/**
 * Two items, (2 × 150) and (3 × 100), at 10% tax: subtotal 600, tax 60, total 660.
 */
export function buildInvoiceDto(clientId: string, overrides: Partial<CreateInvoiceDto> = {}): CreateInvoiceDto {
  return {
    client_id: clientId,
    invoice_number: 'INV-2024-001',
    invoice_date: '2024-01-15',
    due_date: '2024-02-15',
    tax_rate: '10',
    line_items: [
      { description: 'Design work', quantity: '2', unit_rate: '150' },
      { description: 'Consulting', quantity: '3', unit_rate: '100' },
    ],
    ...overrides,
  };
}

export function buildInvoice(overrides: Partial<CreateInvoiceDto> = {}, client: Client = buildClient()): Invoice {
  const invoice = Invoice.create(TEST_USER_ID, buildInvoiceDto(client.id, overrides), CREATED_AT);
  invoice.attachClient(client);
  return invoice;
}
