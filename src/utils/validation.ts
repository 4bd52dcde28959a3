import Joi from 'joi';

const emailSchema = Joi.string().email({ tlds: { allow: false } }).required();

export function isValidEmail(value: string): boolean {
  return !emailSchema.validate(value).error;
}

/**
 * Pushes "<field> is required" onto errors when value is blank, returning the trimmed text.
 */
export function requireText(value: string | undefined | null, field: string, errors: string[]): string {
  const text = (value ?? '').trim();
  if (text.length === 0) {
    errors.push(`${field} is required`);
  }
  return text;
}
