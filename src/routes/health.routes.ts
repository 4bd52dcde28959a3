import { Router, Request, Response } from 'express';
import { errorMessage } from '../utils/errors';

export type DatabaseCheck = () => Promise<void>;

/**
 * Root and health endpoints. Neither requires authentication.
 */
export function createHealthRouter(version: string, checkDatabase: DatabaseCheck): Router {
  const router = Router();

  /**
   * @openapi
   * /:
   *   get:
   *     tags:
   *       - Health
   *     summary: API banner
   */
  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ message: 'Invoice API', version });
  });

  /**
   * @openapi
   * /health:
   *   get:
   *     tags:
   *       - Health
   *     summary: Liveness and database reachability
   *     responses:
   *       200:
   *         description: healthy, or degraded with the database error
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      await checkDatabase();
      res.status(200).json({ status: 'healthy', api: 'operational', database: 'connected' });
    } catch (err) {
      console.warn('Health check degraded:', err);
      res.status(200).json({
        status: 'degraded',
        api: 'operational',
        database: `error: ${errorMessage(err)}`,
        message: 'Database connection failed',
      });
    }
  });

  return router;
}
