import { Router } from 'express';
import { ClientController } from '../../controllers/business/client.controller';
import { authenticate } from '../../middleware/auth/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import { IdentityProvider } from '../../services/auth/identity.service';
import { idParamsSchema } from '../../schemas/common.schema';
import { createClientSchema, updateClientSchema } from '../../schemas/business/client.schema';

export function createClientRouter(clientController: ClientController, identity: IdentityProvider): Router {
  const router = Router();

  router.use(authenticate(identity));

  /**
   * @openapi
   * /api/clients:
   *   post:
   *     tags:
   *       - Clients
   *     summary: Create a new client
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ClientInput'
   *     responses:
   *       201:
   *         description: Client created successfully
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.post('/', validate(createClientSchema), clientController.create.bind(clientController));

  /**
   * @openapi
   * /api/clients:
   *   get:
   *     tags:
   *       - Clients
   *     summary: Get all clients
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: List of clients
   */
  router.get('/', clientController.findAll.bind(clientController));

  router.get('/:id', validate(idParamsSchema, 'params'), clientController.findById.bind(clientController));

  /**
   * @openapi
   * /api/clients/{id}:
   *   put:
   *     tags:
   *       - Clients
   *     summary: Update a client
   *     description: Only the supplied fields change. An empty body is rejected.
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Client updated successfully
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.put(
    '/:id',
    validate(idParamsSchema, 'params'),
    validate(updateClientSchema),
    clientController.update.bind(clientController),
  );

  /**
   * @openapi
   * /api/clients/{id}:
   *   delete:
   *     tags:
   *       - Clients
   *     summary: Delete a client
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: Client deleted
   *       409:
   *         description: Invoices still reference the client
   */
  router.delete('/:id', validate(idParamsSchema, 'params'), clientController.delete.bind(clientController));

  return router;
}
