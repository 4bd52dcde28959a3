/**
 * Client Validation Schemas
 * Joi schemas for client creation and partial updates.
 */

import Joi from 'joi';

const text = Joi.string().trim().max(255);

/**
 * Schema for creating a client (req.body). Every field is required.
 *
 * @example
 * const { error, value } = createClientSchema.validate(req.body);
 */
export const createClientSchema = Joi.object({
  name: text.required(),
  email: Joi.string().trim().email({ tlds: { allow: false } }).required(),
  street: text.required(),
  city: text.required(),
  state: text.required(),
  zip_code: Joi.string().trim().max(20).required(),
  country: text.required(),
  phone: Joi.string().trim().max(50).required(),
});

/**
 * Schema for updating a client (req.body). Any subset of fields.
 * An empty body passes here and is rejected by the service with "No fields to update".
 */
export const updateClientSchema = Joi.object({
  name: text,
  email: Joi.string().trim().email({ tlds: { allow: false } }),
  street: text,
  city: text,
  state: text,
  zip_code: Joi.string().trim().max(20),
  country: text,
  phone: Joi.string().trim().max(50),
});
