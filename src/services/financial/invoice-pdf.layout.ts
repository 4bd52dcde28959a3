/**
 * @fileoverview Layout stages of the invoice PDF.
 * Each stage projects the invoice aggregate into a renderable section; the renderer
 * draws them in order. Keeping layout free of pdfkit makes the document content testable.
 * @module services/financial/invoice-pdf.layout
 */

import { Invoice } from '../../models/financial/invoice.model';
import { formatFixed2, formatMoney } from '../../utils/decimal';
import { formatLongDate } from '../../utils/date';

export interface LabeledValue {
  label: string;
  value: string;
}

export interface HeaderSection {
  kind: 'header';
  title: string;
  fields: LabeledValue[];
}

export interface ClientSection {
  kind: 'client';
  heading: string;
  name: string;
  lines: string[];
}

export interface LineItemTableSection {
  kind: 'line_items';
  columns: string[];
  rows: string[][];
}

export interface TotalsRow extends LabeledValue {
  emphasized: boolean;
}

export interface TotalsSection {
  kind: 'totals';
  rows: TotalsRow[];
}

export type InvoiceDocumentSection = HeaderSection | ClientSection | LineItemTableSection | TotalsSection;

export const LINE_ITEM_COLUMNS = ['Description', 'Quantity', 'Unit Rate', 'Amount'];

export function buildHeaderSection(invoice: Invoice): HeaderSection {
  return {
    kind: 'header',
    title: 'INVOICE',
    fields: [
      { label: 'Invoice Number:', value: invoice.invoiceNumber },
      { label: 'Invoice Date:', value: formatLongDate(invoice.invoiceDate) },
      { label: 'Due Date:', value: formatLongDate(invoice.dueDate) },
      { label: 'Status:', value: invoice.status.toUpperCase() },
    ],
  };
}

/**
 * Bill-to block. Returns null when no resolved client is attached.
 */
export function buildClientSection(invoice: Invoice): ClientSection | null {
  const client = invoice.client;
  if (!client) {
    return null;
  }

  const address = client.address();
  return {
    kind: 'client',
    heading: 'Bill To:',
    name: client.name,
    lines: [
      address.street,
      `${address.city}, ${address.state} ${address.zip_code}`,
      address.country,
      `Email: ${client.email}`,
      `Phone: ${client.phone}`,
    ],
  };
}

// Amounts are recomputed here with the same decimal arithmetic as the domain
export function buildLineItemTable(invoice: Invoice): LineItemTableSection {
  return {
    kind: 'line_items',
    columns: [...LINE_ITEM_COLUMNS],
    rows: invoice.lineItems.map((item) => [
      item.description,
      formatFixed2(item.quantity),
      formatMoney(item.unitRate),
      formatMoney(item.quantity.times(item.unitRate)),
    ]),
  };
}

export function buildTotalsSection(invoice: Invoice): TotalsSection {
  return {
    kind: 'totals',
    rows: [
      { label: 'Subtotal:', value: formatMoney(invoice.subtotal()), emphasized: false },
      { label: `Tax (${invoice.taxRate.toString()}%):`, value: formatMoney(invoice.tax()), emphasized: false },
      { label: 'Total:', value: formatMoney(invoice.total()), emphasized: true },
    ],
  };
}

/**
 * Runs every layout stage in document order. The client block is skipped when absent.
 * The invoice is trusted as-is: an empty line-item list still yields the table header.
 */
export function layoutInvoice(invoice: Invoice): InvoiceDocumentSection[] {
  const sections: InvoiceDocumentSection[] = [buildHeaderSection(invoice)];

  const clientSection = buildClientSection(invoice);
  if (clientSection) {
    sections.push(clientSection);
  }

  sections.push(buildLineItemTable(invoice), buildTotalsSection(invoice));
  return sections;
}
