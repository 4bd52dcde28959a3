import { Request, Response } from 'express';
import { IdentityProvider } from '../../services/auth/identity.service';
import { sendError } from '../../utils/http';

interface Credentials {
  email: string;
  password: string;
}

/**
 * Controller for registration and login, delegating to the identity provider.
 *
 * @class AuthController
 */
export class AuthController {
  constructor(private readonly identity: IdentityProvider) {}

  /**
   * @example
   * POST /api/auth/register
   * Body: { "email": "user@example.test", "password": "test-secret" }
   * Response: 201 { access_token: "...", token_type: "bearer", user_id: "uuid", email: "user@example.test" }
   * Response: 201 { message: "Registration successful. Please check your email to confirm your account." }
   */
  async register(req: Request, res: Response) {
    try {
      const { email, password }: Credentials = req.body;
      const result = await this.identity.register(email, password);
      if (result.status === 'pending_confirmation') {
        res.status(201).json({ message: result.message });
        return;
      }
      res.status(201).json(result.session);
    } catch (err) {
      console.error('Register error:', err);
      sendError(res, err);
    }
  }

  /**
   * @example
   * POST /api/auth/login
   * Response: 401 { message: "Invalid credentials", code: "AUTHENTICATION_ERROR" }
   */
  async login(req: Request, res: Response) {
    try {
      const { email, password }: Credentials = req.body;
      const session = await this.identity.login(email, password);
      res.status(200).json(session);
    } catch (err) {
      console.error('Login error:', err);
      sendError(res, err);
    }
  }
}
