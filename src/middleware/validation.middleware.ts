import { Request, Response, NextFunction, RequestHandler } from 'express';
import Joi from 'joi';

type ValidationTarget = 'body' | 'params' | 'query';

/**
 * Generic validation middleware using Joi schemas.
 * Validates the chosen part of the request and replaces it with the converted value
 * (defaults applied, numbers normalized to decimal strings, unknown keys stripped).
 *
 * @example
 * router.post('/', validate(createClientSchema), controller.create.bind(controller));
 * router.get('/', validate(invoiceListQuerySchema, 'query'), controller.findAll.bind(controller));
 */
export const validate = (schema: Joi.Schema, target: ValidationTarget = 'body'): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req[target] ?? {}, { abortEarly: false, stripUnknown: true });
    if (error) {
      const errorMessage = error.details.map((detail: Joi.ValidationErrorItem) => detail.message).join(', ');
      res.status(400).json({ message: 'Validation failed', details: errorMessage });
      return;
    }
    req[target] = value;
    next();
  };
