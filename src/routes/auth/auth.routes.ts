import { Router } from 'express';
import { AuthController } from '../../controllers/auth/auth.controller';
import { validate } from '../../middleware/validation.middleware';
import { credentialsSchema } from '../../schemas/auth/auth.schema';

export function createAuthRouter(authController: AuthController): Router {
  const router = Router();

  /**
   * @openapi
   * /api/auth/register:
   *   post:
   *     tags:
   *       - Authentication
   *     summary: Register a new user
   *     responses:
   *       201:
   *         description: Registered; a token, or a message asking to confirm the email address
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.post('/register', validate(credentialsSchema), authController.register.bind(authController));

  /**
   * @openapi
   * /api/auth/login:
   *   post:
   *     tags:
   *       - Authentication
   *     summary: Login with email and password
   *     responses:
   *       200:
   *         description: Bearer token for the user
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  router.post('/login', validate(credentialsSchema), authController.login.bind(authController));

  return router;
}
