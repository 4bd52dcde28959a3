// Client-related models

import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../../utils/errors';
import { isValidEmail, requireText } from '../../utils/validation';

/**
 * Postal address of a client, projected from the client's flat address fields.
 *
 * @interface Address
 */
export interface Address {
  street: string;
  city: string;
  state: string;
  zip_code: string;
  country: string;
}

/**
 * Data transfer object for creating a new client.
 * Every field is required; the owning user is taken from the authenticated request.
 *
 * @interface CreateClientDto
 * @example
 * const newClient: CreateClientDto = {
 *   name: 'Acme Corporation',
 *   email: 'billing@acme.test',
 *   street: '123 Main St',
 *   city: 'San Francisco',
 *   state: 'CA',
 *   zip_code: '94102',
 *   country: 'USA',
 *   phone: '+1-555-0100'
 * };
 */
export interface CreateClientDto {
  name: string;
  email: string;
  street: string;
  city: string;
  state: string;
  zip_code: string;
  country: string;
  phone: string;
}

/**
 * Partial client update. Only supplied fields change.
 */
export type UpdateClientDto = Partial<CreateClientDto>;

/**
 * Client row as stored in the clients table.
 *
 * @interface ClientRecord
 */
export interface ClientRecord extends CreateClientDto {
  id: string;
  user_id: string; // Multi-tenant: the authenticated user who owns this client
  created_at: Date;
  updated_at: Date;
}

const CLIENT_FIELDS: ReadonlyArray<keyof CreateClientDto> = [
  'name',
  'email',
  'street',
  'city',
  'state',
  'zip_code',
  'country',
  'phone',
];

/**
 * Customer record an invoice is addressed to.
 * Pure data with an address projection; referenced (never owned) by invoices.
 */
export class Client {
  readonly id: string;
  readonly userId: string;
  private fields: CreateClientDto;
  private readonly createdAtValue: Date;
  private updatedAtValue: Date;

  private constructor(id: string, userId: string, fields: CreateClientDto, createdAt: Date, updatedAt: Date) {
    this.id = id;
    this.userId = userId;
    this.fields = fields;
    this.createdAtValue = createdAt;
    this.updatedAtValue = updatedAt;
  }

  /**
   * Validates and builds a new client owned by userId.
   *
   * @throws {ValidationError} On an empty required field or a malformed email
   */
  static create(userId: string, dto: CreateClientDto, now: Date = new Date()): Client {
    return new Client(uuidv4(), userId, validateFields(dto), now, now);
  }

  static fromRecord(record: ClientRecord): Client {
    return new Client(record.id, record.user_id, validateFields(record), record.created_at, record.updated_at);
  }

  get name(): string {
    return this.fields.name;
  }

  get email(): string {
    return this.fields.email;
  }

  get phone(): string {
    return this.fields.phone;
  }

  get createdAt(): Date {
    return this.createdAtValue;
  }

  get updatedAt(): Date {
    return this.updatedAtValue;
  }

  address(): Address {
    return {
      street: this.fields.street,
      city: this.fields.city,
      state: this.fields.state,
      zip_code: this.fields.zip_code,
      country: this.fields.country,
    };
  }

  /**
   * Merges the supplied fields over the current ones.
   * A patch without any field leaves the client (and its update timestamp) untouched.
   *
   * @throws {ValidationError} If the merged fields are invalid; the client is left unchanged
   */
  update(patch: UpdateClientDto, now: Date = new Date()): Client {
    const supplied = suppliedFields(patch);
    if (supplied.length === 0) {
      return this;
    }

    const merged: CreateClientDto = { ...this.fields };
    for (const field of supplied) {
      const value = patch[field];
      if (value !== undefined) {
        merged[field] = value;
      }
    }

    this.fields = validateFields(merged);
    this.updatedAtValue = now;
    return this;
  }

  toRecord(): ClientRecord {
    return {
      id: this.id,
      user_id: this.userId,
      ...this.fields,
      created_at: this.createdAtValue,
      updated_at: this.updatedAtValue,
    };
  }
}

/**
 * Names of the fields a patch actually supplies (undefined means "not supplied").
 */
export function suppliedFields(patch: UpdateClientDto): Array<keyof CreateClientDto> {
  return CLIENT_FIELDS.filter((field) => patch[field] !== undefined);
}

function validateFields(dto: CreateClientDto): CreateClientDto {
  const errors: string[] = [];
  const fields: CreateClientDto = {
    name: requireText(dto.name, 'name', errors),
    email: requireText(dto.email, 'email', errors),
    street: requireText(dto.street, 'street', errors),
    city: requireText(dto.city, 'city', errors),
    state: requireText(dto.state, 'state', errors),
    zip_code: requireText(dto.zip_code, 'zip_code', errors),
    country: requireText(dto.country, 'country', errors),
    phone: requireText(dto.phone, 'phone', errors),
  };

  if (fields.email && !isValidEmail(fields.email)) {
    errors.push('email must be a valid email');
  }

  if (errors.length > 0) {
    throw new ValidationError(`Invalid client: ${errors.join(', ')}`, errors);
  }
  return fields;
}
