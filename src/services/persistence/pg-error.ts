import { DatabaseError } from 'pg';
import { AppError, PersistenceError, ReferentialIntegrityError, ValidationError } from '../../utils/errors';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';

/**
 * Maps a driver failure to an AppError. Constraint violations the schema enforces
 * become the domain errors they stand for; anything else is a PersistenceError.
 */
export function translateDbError(operation: string, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof DatabaseError) {
    switch (error.code) {
      case UNIQUE_VIOLATION:
        if (error.constraint === 'invoices_user_invoice_number_key') {
          return new ValidationError('Invoice number already exists');
        }
        break;
      case FOREIGN_KEY_VIOLATION:
        if (error.constraint === 'invoices_client_id_fkey') {
          return new ReferentialIntegrityError('Cannot delete client with associated invoices');
        }
        break;
      case CHECK_VIOLATION:
        return new ValidationError(`Constraint ${error.constraint ?? 'check'} violated`);
    }
  }
  return new PersistenceError(operation, error);
}
