import { Request, Response } from 'express';
import { CreateInvoiceDto, UpdateInvoiceDto, isInvoiceStatus } from '../../models/financial/invoice.model';
import { InvoiceService } from '../../services/financial/invoice.service';
import { PDF_CONTENT_TYPE } from '../../services/financial/invoice-pdf.service';
import { InvoiceFilter } from '../../services/persistence/store.types';
import { currentUserId } from '../../middleware/auth/auth.middleware';
import { sendError } from '../../utils/http';

/**
 * Controller for handling HTTP requests related to invoice management.
 * Provides CRUD operations, lifecycle transitions and PDF export.
 * Every response carries subtotal, tax and total computed from the line items.
 *
 * @class InvoiceController
 */
export class InvoiceController {
  constructor(private readonly invoiceService: InvoiceService) {}

  /**
   * Creates a new draft invoice.
   *
   * @example
   * POST /api/invoices
   * Body: {
   *   "client_id": "client-uuid",
   *   "invoice_number": "INV-2024-001",
   *   "invoice_date": "2024-01-15",
   *   "due_date": "2024-02-15",
   *   "tax_rate": "8.5",
   *   "line_items": [{ "description": "Web Development", "quantity": "40", "unit_rate": "150" }]
   * }
   * Response: 201 { id: "uuid", status: "draft", subtotal: "6000", tax: "510", total: "6510", ... }
   */
  async create(req: Request, res: Response) {
    try {
      const dto: CreateInvoiceDto = req.body;
      const invoice = await this.invoiceService.create(currentUserId(res), dto);
      res.status(201).json(invoice);
    } catch (err) {
      console.error('Create invoice error:', err);
      sendError(res, err);
    }
  }

  /**
   * Lists invoices, newest first.
   *
   * @example
   * GET /api/invoices?status=sent
   * Response: 200 [{ id: "uuid", invoice_number: "INV-2024-001", status: "sent", ... }, ...]
   */
  async findAll(req: Request, res: Response) {
    try {
      const filter: InvoiceFilter = {};
      const { status, client_id } = req.query;
      if (typeof status === 'string' && isInvoiceStatus(status)) {
        filter.status = status;
      }
      if (typeof client_id === 'string') {
        filter.client_id = client_id;
      }

      const invoices = await this.invoiceService.findAll(currentUserId(res), filter);
      res.status(200).json(invoices);
    } catch (err) {
      console.error('Find all invoices error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * GET /api/invoices/123e4567-e89b-42d3-a456-426614174000
   * Response: 404 { message: "Invoice not found", code: "NOT_FOUND" }
   */
  async findById(req: Request, res: Response) {
    try {
      const invoice = await this.invoiceService.findById(req.params.id, currentUserId(res));
      res.status(200).json(invoice);
    } catch (err) {
      console.error('Find invoice by ID error:', err);
      sendError(res, err);
    }
  }

  /**
   * Updates an invoice with partial data. line_items replaces all existing items.
   *
   * @example
   * PUT /api/invoices/:id
   * Body: { "tax_rate": "10" }
   * Response: 200 { id: "uuid", tax_rate: "10", ... }
   */
  async update(req: Request, res: Response) {
    try {
      const patch: UpdateInvoiceDto = req.body;
      const invoice = await this.invoiceService.update(req.params.id, currentUserId(res), patch);
      res.status(200).json(invoice);
    } catch (err) {
      console.error('Update invoice error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * POST /api/invoices/:id/send
   * Response: 200 { id: "uuid", status: "sent", sent_date: "2024-01-16T09:00:00.000Z", ... }
   */
  async markSent(req: Request, res: Response) {
    try {
      const invoice = await this.invoiceService.markSent(req.params.id, currentUserId(res));
      res.status(200).json(invoice);
    } catch (err) {
      console.error('Send invoice error:', err);
      sendError(res, err);
    }
  }

  async markPaid(req: Request, res: Response) {
    try {
      const invoice = await this.invoiceService.markPaid(req.params.id, currentUserId(res));
      res.status(200).json(invoice);
    } catch (err) {
      console.error('Pay invoice error:', err);
      sendError(res, err);
    }
  }

  async checkOverdue(req: Request, res: Response) {
    try {
      const invoice = await this.invoiceService.checkOverdue(req.params.id, currentUserId(res));
      res.status(200).json(invoice);
    } catch (err) {
      console.error('Check overdue invoice error:', err);
      sendError(res, err);
    }
  }

  async delete(req: Request, res: Response) {
    try {
      await this.invoiceService.delete(req.params.id, currentUserId(res));
      res.status(204).send();
    } catch (err) {
      console.error('Delete invoice error:', err);
      sendError(res, err);
    }
  }

  /**
   * Downloads the invoice as a PDF attachment.
   *
   * @example
   * GET /api/invoices/:id/pdf
   * Response: 200 application/pdf, Content-Disposition: attachment; filename="invoice-INV-2024-001.pdf"
   */
  async generatePDF(req: Request, res: Response) {
    try {
      const pdf = await this.invoiceService.exportPdf(req.params.id, currentUserId(res));
      res.setHeader('Content-Type', PDF_CONTENT_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${pdf.filename}"`);
      res.setHeader('Content-Length', pdf.content.length);
      res.send(pdf.content);
    } catch (err) {
      console.error('Generate invoice PDF error:', err);
      sendError(res, err);
    }
  }
}
