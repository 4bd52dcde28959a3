import { Router } from 'express';
import { InvoiceController } from '../../controllers/financial/invoice.controller';
import { authenticate } from '../../middleware/auth/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import { IdentityProvider } from '../../services/auth/identity.service';
import { idParamsSchema } from '../../schemas/common.schema';
import {
  createInvoiceSchema,
  invoiceListQuerySchema,
  updateInvoiceSchema,
} from '../../schemas/financial/invoice.schema';

export function createInvoiceRouter(invoiceController: InvoiceController, identity: IdentityProvider): Router {
  const router = Router();

  // Every invoice route requires a bearer token
  router.use(authenticate(identity));

  /**
   * @openapi
   * /api/invoices:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Create a new invoice
   *     description: Creates a draft invoice for one of the user's clients. Totals are derived from the line items.
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [client_id, invoice_number, invoice_date, due_date, line_items]
   *             properties:
   *               client_id:
   *                 type: string
   *                 format: uuid
   *               invoice_number:
   *                 type: string
   *               invoice_date:
   *                 type: string
   *                 format: date
   *               due_date:
   *                 type: string
   *                 format: date
   *               tax_rate:
   *                 type: string
   *                 format: decimal
   *               line_items:
   *                 type: array
   *                 minItems: 1
   *                 items:
   *                   $ref: '#/components/schemas/LineItemInput'
   *     responses:
   *       201:
   *         description: Invoice created successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Invoice'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.post('/', validate(createInvoiceSchema), invoiceController.create.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices:
   *   get:
   *     tags:
   *       - Invoices
   *     summary: Get all invoices
   *     description: Retrieves the authenticated user's invoices, newest first
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [draft, sent, paid, overdue]
   *       - in: query
   *         name: client_id
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: List of invoices
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  router.get('/', validate(invoiceListQuerySchema, 'query'), invoiceController.findAll.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}:
   *   get:
   *     tags:
   *       - Invoices
   *     summary: Get invoice by ID
   *     description: Retrieves a single invoice with its client and line items
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Invoice found
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.get('/:id', validate(idParamsSchema, 'params'), invoiceController.findById.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}:
   *   put:
   *     tags:
   *       - Invoices
   *     summary: Update an invoice
   *     description: Partial update. line_items, when given, replaces every existing item.
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Invoice updated successfully
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.put(
    '/:id',
    validate(idParamsSchema, 'params'),
    validate(updateInvoiceSchema),
    invoiceController.update.bind(invoiceController),
  );

  /**
   * @openapi
   * /api/invoices/{id}:
   *   delete:
   *     tags:
   *       - Invoices
   *     summary: Delete an invoice
   *     description: Deletes the invoice together with its line items
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: Invoice deleted
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.delete('/:id', validate(idParamsSchema, 'params'), invoiceController.delete.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}/send:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Mark an invoice as sent
   *     description: Sets status to sent. sent_date is recorded the first time only.
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Invoice marked as sent
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.post('/:id/send', validate(idParamsSchema, 'params'), invoiceController.markSent.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}/pay:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Mark an invoice as paid
   *     description: Sets status to paid. paid_date is recorded the first time only.
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Invoice marked as paid
   */
  router.post('/:id/pay', validate(idParamsSchema, 'params'), invoiceController.markPaid.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}/check-overdue:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Re-evaluate overdue status
   *     description: A sent invoice whose due date has passed becomes overdue
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Invoice after the check
   */
  router.post(
    '/:id/check-overdue',
    validate(idParamsSchema, 'params'),
    invoiceController.checkOverdue.bind(invoiceController),
  );

  /**
   * @openapi
   * /api/invoices/{id}/pdf:
   *   get:
   *     tags:
   *       - Invoices
   *     summary: Generate and download invoice PDF
   *     description: Renders the invoice, with its bill-to block and totals, as a PDF attachment
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: PDF generated successfully
   *         content:
   *           application/pdf:
   *             schema:
   *               type: string
   *               format: binary
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *       500:
   *         $ref: '#/components/responses/ServerError'
   */
  router.get('/:id/pdf', validate(idParamsSchema, 'params'), invoiceController.generatePDF.bind(invoiceController));

  return router;
}
