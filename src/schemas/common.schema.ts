import Joi from 'joi';
import { DECIMAL_PATTERN } from '../utils/decimal';

/**
 * Schema for resource ids (UUID v4) in route parameters.
 *
 * @example
 * router.get('/:id', validate(idParamsSchema, 'params'), controller.findById.bind(controller));
 */
export const idParamsSchema = Joi.object({
  id: Joi.string().guid({ version: ['uuidv4'] }).required(),
});

/**
 * Decimal amount: a decimal string, or a JSON number converted to its string form.
 * Range checks belong to the entity receiving the value.
 */
export const decimalSchema = Joi.alternatives().try(
  Joi.string().trim().pattern(DECIMAL_PATTERN).messages({
    'string.pattern.base': '{{#label}} must be a decimal number',
  }),
  Joi.number().custom((value: number) => String(value)),
);

/**
 * Calendar date written as YYYY-MM-DD.
 */
export const calendarDateSchema = Joi.string()
  .pattern(/^\d{4}-\d{2}-\d{2}$/)
  .messages({ 'string.pattern.base': '{{#label}} must be a date in YYYY-MM-DD format' });
