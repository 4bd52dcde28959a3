/**
 * @fileoverview Renders invoices to PDF with pdfkit.
 * Draws the sections produced by the layout stages in order and buffers the whole
 * document before resolving, so a failure never yields a partial file.
 * @module services/financial/invoice-pdf.service
 */

import PDFDocument from 'pdfkit';
import { PassThrough } from 'stream';
import { Invoice } from '../../models/financial/invoice.model';
import { RenderError, errorMessage } from '../../utils/errors';
import {
  ClientSection,
  HeaderSection,
  InvoiceDocumentSection,
  LineItemTableSection,
  TotalsSection,
  layoutInvoice,
} from './invoice-pdf.layout';

const INCH = 72;

const COLORS = {
  title: '#1a1a1a',
  heading: '#333333',
  text: '#000000',
  muted: '#4a5568',
  tableHeaderBg: '#4a5568',
  tableHeaderText: '#FFFFFF',
  rowBg: '#FFFFFF',
  stripeBg: '#f7fafc',
  grid: '#e2e8f0',
};

const COLUMN_WIDTHS = [3.5 * INCH, 1 * INCH, 1 * INCH, 1 * INCH];
const TABLE_WIDTH = COLUMN_WIDTHS.reduce((sum, width) => sum + width, 0);
const CELL_PADDING_X = 6;
const SECTION_GAP = 0.3 * INCH;
const TOTALS_LABEL_WIDTH = 1.5 * INCH;
const TOTALS_VALUE_WIDTH = 1 * INCH;

export const PDF_CONTENT_TYPE = 'application/pdf';

/**
 * Attachment name used when an invoice PDF is downloaded.
 *
 * @example
 * pdfFilename(invoice); // 'invoice-INV-2024-001.pdf'
 */
export function pdfFilename(invoice: Invoice): string {
  return `invoice-${invoice.invoiceNumber}.pdf`;
}

/**
 * Service exporting a hydrated invoice (line items and, optionally, its client) as PDF bytes.
 * Does not fetch anything itself.
 *
 * @class InvoicePdfService
 */
export class InvoicePdfService {
  /**
   * Renders the invoice. The resolved buffer starts with the '%PDF-' signature.
   *
   * @throws {RenderError} If the layout, drawing or streaming fails
   */
  async export(invoice: Invoice): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const pdfBuffers: Buffer[] = [];
      const bufferStream = new PassThrough();
      bufferStream.on('data', (chunk: Buffer) => pdfBuffers.push(chunk));
      bufferStream.on('end', () => resolve(Buffer.concat(pdfBuffers)));
      bufferStream.on('error', (streamError: Error) => {
        reject(new RenderError(`Failed to render invoice PDF: ${streamError.message}`, streamError));
      });

      try {
        const sections = layoutInvoice(invoice);
        const doc = new PDFDocument({
          size: 'LETTER',
          margins: { top: INCH, left: INCH, right: INCH, bottom: 0.75 * INCH },
          info: {
            Title: `Invoice ${invoice.invoiceNumber}`,
            Subject: 'Invoice',
            CreationDate: invoice.createdAt,
          },
        });
        doc.on('error', (docError: Error) => bufferStream.destroy(docError));
        doc.pipe(bufferStream);

        sections.forEach((section, index) => {
          if (index > 0) {
            doc.x = doc.page.margins.left;
            doc.y += SECTION_GAP;
          }
          this.drawSection(doc, section);
        });

        doc.end();
      } catch (renderError) {
        bufferStream.destroy();
        reject(new RenderError(`Failed to render invoice PDF: ${errorMessage(renderError)}`, renderError));
      }
    });
  }

  private drawSection(doc: PDFKit.PDFDocument, section: InvoiceDocumentSection): void {
    switch (section.kind) {
      case 'header':
        this.drawHeader(doc, section);
        break;
      case 'client':
        this.drawClient(doc, section);
        break;
      case 'line_items':
        this.drawLineItems(doc, section);
        break;
      case 'totals':
        this.drawTotals(doc, section);
        break;
    }
  }

  private drawHeader(doc: PDFKit.PDFDocument, section: HeaderSection): void {
    doc.font('Helvetica-Bold')
       .fontSize(24)
       .fillColor(COLORS.title)
       .text(section.title);
    doc.moveDown(0.5);

    doc.fontSize(10).fillColor(COLORS.text);
    for (const field of section.fields) {
      doc.font('Helvetica-Bold')
         .text(`${field.label} `, { continued: true })
         .font('Helvetica')
         .text(field.value);
    }
  }

  private drawClient(doc: PDFKit.PDFDocument, section: ClientSection): void {
    doc.font('Helvetica-Bold')
       .fontSize(14)
       .fillColor(COLORS.heading)
       .text(section.heading);
    doc.moveDown(0.3);

    doc.fontSize(10)
       .fillColor(COLORS.text)
       .text(section.name);
    doc.font('Helvetica');
    for (const line of section.lines) {
      doc.text(line);
    }
  }

  private drawLineItems(doc: PDFKit.PDFDocument, section: LineItemTableSection): void {
    const pageBottom = () => doc.page.height - doc.page.margins.bottom;
    let tableY = this.drawTableRow(doc, section.columns, doc.y, true, 0);

    section.rows.forEach((row, index) => {
      // Start a new page, with the column header repeated, when the row would not fit
      if (tableY + this.measureRow(doc, row, false) > pageBottom()) {
        doc.addPage();
        tableY = this.drawTableRow(doc, section.columns, doc.page.margins.top, true, 0);
      }
      tableY = this.drawTableRow(doc, row, tableY, false, index);
    });

    doc.x = doc.page.margins.left;
    doc.y = tableY;
  }

  private measureRow(doc: PDFKit.PDFDocument, cells: string[], header: boolean): number {
    doc.font(header ? 'Helvetica-Bold' : 'Helvetica').fontSize(header ? 12 : 10);
    const textHeight = Math.max(
      ...cells.map((cell, column) => doc.heightOfString(cell, { width: COLUMN_WIDTHS[column] - 2 * CELL_PADDING_X })),
    );
    return textHeight + 2 * (header ? 12 : 8);
  }

  /**
   * Draws one table row at y and returns the y just below it.
   */
  private drawTableRow(doc: PDFKit.PDFDocument, cells: string[], y: number, header: boolean, index: number): number {
    const left = doc.page.margins.left;
    const padding = header ? 12 : 8;
    const height = this.measureRow(doc, cells, header);

    const background = header ? COLORS.tableHeaderBg : index % 2 === 0 ? COLORS.rowBg : COLORS.stripeBg;
    doc.rect(left, y, TABLE_WIDTH, height).fill(background);

    doc.fillColor(header ? COLORS.tableHeaderText : COLORS.text);
    let cellX = left;
    cells.forEach((cell, column) => {
      doc.text(cell, cellX + CELL_PADDING_X, y + padding, {
        width: COLUMN_WIDTHS[column] - 2 * CELL_PADDING_X,
        align: header || column === 0 ? 'left' : 'right',
      });
      cellX += COLUMN_WIDTHS[column];
    });

    doc.lineWidth(1).strokeColor(COLORS.grid);
    doc.rect(left, y, TABLE_WIDTH, height).stroke();
    let borderX = left;
    for (const width of COLUMN_WIDTHS.slice(0, -1)) {
      borderX += width;
      doc.moveTo(borderX, y).lineTo(borderX, y + height).stroke();
    }

    return y + height;
  }

  private drawTotals(doc: PDFKit.PDFDocument, section: TotalsSection): void {
    const blockX = doc.page.margins.left + TABLE_WIDTH - (TOTALS_LABEL_WIDTH + TOTALS_VALUE_WIDTH);
    const blockHeight = section.rows.length * 30;
    if (doc.y + blockHeight > doc.page.height - doc.page.margins.bottom) {
      doc.addPage();
    }

    let rowY = doc.y;
    for (const row of section.rows) {
      if (row.emphasized) {
        rowY += 4;
        doc.moveTo(blockX, rowY)
           .lineTo(blockX + TOTALS_LABEL_WIDTH + TOTALS_VALUE_WIDTH, rowY)
           .lineWidth(2)
           .strokeColor(COLORS.muted)
           .stroke();
        rowY += 10;
      } else {
        rowY += 6;
      }

      doc.font(row.emphasized ? 'Helvetica-Bold' : 'Helvetica')
         .fontSize(row.emphasized ? 13 : 11)
         .fillColor(row.emphasized ? COLORS.title : COLORS.muted)
         .text(row.label, blockX, rowY, { width: TOTALS_LABEL_WIDTH - CELL_PADDING_X, align: 'right' })
         .text(row.value, blockX + TOTALS_LABEL_WIDTH, rowY, { width: TOTALS_VALUE_WIDTH, align: 'right' });

      rowY += (row.emphasized ? 13 : 11) + 6;
    }

    doc.x = doc.page.margins.left;
    doc.y = rowY;
  }
}
