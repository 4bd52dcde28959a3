/**
 * Invoice Validation Schemas
 * Provides Joi validation schemas for invoice creation, updates and listing.
 * Amounts are decimal strings; totals are never accepted from clients.
 */

import Joi from 'joi';
import { INVOICE_STATUSES } from '../../models/financial/invoice.model';
import { calendarDateSchema, decimalSchema } from '../common.schema';

/**
 * Schema for a single line item.
 *
 * @example
 * { description: 'Web Development', quantity: '40', unit_rate: '150.00' }
 */
export const lineItemSchema = Joi.object({
  description: Joi.string().trim().max(500).required(),
  quantity: decimalSchema.required(),
  unit_rate: decimalSchema.required(),
});

/**
 * Schema for creating an invoice (req.body).
 * - line_items must hold at least one item
 * - tax_rate defaults to 0
 * Date order and the tax rate range are checked by the Invoice entity.
 *
 * @example
 * const { error, value } = createInvoiceSchema.validate(req.body);
 */
export const createInvoiceSchema = Joi.object({
  client_id: Joi.string().guid({ version: ['uuidv4'] }).required(),
  invoice_number: Joi.string().trim().max(50).required(),
  invoice_date: calendarDateSchema.required(),
  due_date: calendarDateSchema.required(),
  tax_rate: decimalSchema.default('0'),
  line_items: Joi.array().items(lineItemSchema).min(1).required(),
});

/**
 * Schema for updating an invoice (req.body). Every field is optional;
 * line_items, when present, replaces all existing items and must not be empty.
 */
export const updateInvoiceSchema = Joi.object({
  client_id: Joi.string().guid({ version: ['uuidv4'] }),
  invoice_number: Joi.string().trim().max(50),
  invoice_date: calendarDateSchema,
  due_date: calendarDateSchema,
  tax_rate: decimalSchema,
  status: Joi.string().valid(...INVOICE_STATUSES),
  line_items: Joi.array().items(lineItemSchema).min(1),
});

/**
 * Schema for the invoice list query string.
 *
 * @example
 * GET /api/invoices?status=sent&client_id=<uuid>
 */
export const invoiceListQuerySchema = Joi.object({
  status: Joi.string().valid(...INVOICE_STATUSES),
  client_id: Joi.string().guid({ version: ['uuidv4'] }),
});
