import { Request, Response } from 'express';
import { CreateClientDto, UpdateClientDto } from '../../models/business/client.model';
import { ClientService } from '../../services/business/client.service';
import { currentUserId } from '../../middleware/auth/auth.middleware';
import { sendError } from '../../utils/http';

/**
 * Controller for handling HTTP requests related to client management.
 * Request bodies are validated by the Joi middleware on the route before reaching it.
 *
 * @class ClientController
 */
export class ClientController {
  constructor(private readonly clientService: ClientService) {}

  /**
   * Creates a new client for the authenticated user.
   *
   * @example
   * POST /api/clients
   * Body: { "name": "Acme Corporation", "email": "billing@acme.test", ... }
   * Response: 201 { id: "uuid", name: "Acme Corporation", ... }
   */
  async create(req: Request, res: Response) {
    try {
      const dto: CreateClientDto = req.body;
      const client = await this.clientService.create(currentUserId(res), dto);
      res.status(201).json(client);
    } catch (err) {
      console.error('Create client error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * GET /api/clients
   * Response: 200 [{ id: "uuid", name: "Acme Corporation", ... }, ...]
   */
  async findAll(req: Request, res: Response) {
    try {
      const clients = await this.clientService.findAll(currentUserId(res));
      res.status(200).json(clients);
    } catch (err) {
      console.error('Find all clients error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * GET /api/clients/123e4567-e89b-42d3-a456-426614174000
   * Response: 404 { message: "Client not found", code: "NOT_FOUND" }
   */
  async findById(req: Request, res: Response) {
    try {
      const client = await this.clientService.findById(req.params.id, currentUserId(res));
      res.status(200).json(client);
    } catch (err) {
      console.error('Find client by ID error:', err);
      sendError(res, err);
    }
  }

  /**
   * Updates the supplied fields only.
   *
   * @example
   * PUT /api/clients/:id
   * Body: { "phone": "+1-555-0199" }
   * Response: 200 { id: "uuid", phone: "+1-555-0199", ... }
   * Response: 400 { message: "No fields to update", code: "VALIDATION_ERROR" }
   */
  async update(req: Request, res: Response) {
    try {
      const patch: UpdateClientDto = req.body;
      const client = await this.clientService.update(req.params.id, currentUserId(res), patch);
      res.status(200).json(client);
    } catch (err) {
      console.error('Update client error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * DELETE /api/clients/:id
   * Response: 204
   * Response: 409 { message: "Cannot delete client with associated invoices", code: "REFERENTIAL_INTEGRITY_ERROR" }
   */
  async delete(req: Request, res: Response) {
    try {
      await this.clientService.delete(req.params.id, currentUserId(res));
      res.status(204).send();
    } catch (err) {
      console.error('Delete client error:', err);
      sendError(res, err);
    }
  }
}
