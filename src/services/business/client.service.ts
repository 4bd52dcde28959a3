import { Client, ClientRecord, CreateClientDto, UpdateClientDto, suppliedFields } from '../../models/business/client.model';
import { NotFoundError, ReferentialIntegrityError, ValidationError } from '../../utils/errors';
import { ClientStore, InvoiceStore } from '../persistence/store.types';

/**
 * Service for managing clients.
 * Validation is delegated to the Client entity; persistence to the injected stores.
 *
 * @class ClientService
 */
export class ClientService {
  constructor(
    private readonly clients: ClientStore,
    private readonly invoices: InvoiceStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Creates a client owned by userId.
   *
   * @throws {ValidationError} On an empty required field or a malformed email
   *
   * @example
   * const client = await clientService.create(userId, {
   *   name: 'Acme Corporation', email: 'billing@acme.test', street: '123 Main St',
   *   city: 'San Francisco', state: 'CA', zip_code: '94102', country: 'USA', phone: '+1-555-0100'
   * });
   */
  async create(userId: string, dto: CreateClientDto): Promise<ClientRecord> {
    const client = Client.create(userId, dto, this.clock());
    return this.clients.insert(client.toRecord());
  }

  async findAll(userId: string): Promise<ClientRecord[]> {
    return this.clients.findAll(userId);
  }

  /**
   * @throws {NotFoundError} If the client does not exist for this user
   */
  async findById(id: string, userId: string): Promise<ClientRecord> {
    const record = await this.clients.findById(id, userId);
    if (!record) {
      throw new NotFoundError('Client');
    }
    return record;
  }

  /**
   * Applies a partial update. Only supplied fields change.
   *
   * @throws {ValidationError} When no field is supplied, or the merged fields are invalid
   * @throws {NotFoundError} If the client does not exist for this user
   */
  async update(id: string, userId: string, patch: UpdateClientDto): Promise<ClientRecord> {
    if (suppliedFields(patch).length === 0) {
      throw new ValidationError('No fields to update');
    }

    const client = Client.fromRecord(await this.findById(id, userId));
    client.update(patch, this.clock());

    const updated = await this.clients.update(client.toRecord());
    if (!updated) {
      throw new NotFoundError('Client');
    }
    return updated;
  }

  /**
   * Deletes a client that no invoice references.
   *
   * @throws {ReferentialIntegrityError} If invoices still reference the client
   * @throws {NotFoundError} If the client does not exist for this user
   */
  async delete(id: string, userId: string): Promise<void> {
    await this.findById(id, userId);

    const invoiceCount = await this.invoices.countByClient(id, userId);
    if (invoiceCount > 0) {
      throw new ReferentialIntegrityError('Cannot delete client with associated invoices');
    }

    const deleted = await this.clients.delete(id, userId);
    if (!deleted) {
      throw new NotFoundError('Client');
    }
  }
}
