import Joi from 'joi';

/**
 * Schema for register and login requests.
 */
export const credentialsSchema = Joi.object({
  email: Joi.string().trim().email({ tlds: { allow: false } }).required(),
  password: Joi.string().min(6).required(),
});
