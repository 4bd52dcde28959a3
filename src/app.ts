import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { AuthController } from './controllers/auth/auth.controller';
import { ClientController } from './controllers/business/client.controller';
import { InvoiceController } from './controllers/financial/invoice.controller';
import { createAuthRouter } from './routes/auth/auth.routes';
import { createClientRouter } from './routes/business/client.routes';
import { createInvoiceRouter } from './routes/financial/invoice.routes';
import { createHealthRouter, DatabaseCheck } from './routes/health.routes';
import { IdentityProvider } from './services/auth/identity.service';
import { ClientService } from './services/business/client.service';
import { InvoicePdfService } from './services/financial/invoice-pdf.service';
import { InvoiceService } from './services/financial/invoice.service';
import { ClientStore, InvoiceStore } from './services/persistence/store.types';
import { sendError } from './utils/http';

export const API_VERSION = '0.1.0';

export interface AppDependencies {
  clientStore: ClientStore;
  invoiceStore: InvoiceStore;
  identity: IdentityProvider;
  checkDatabase: DatabaseCheck;
  corsOrigins: string[];
  /** IANA zone deciding "today" for overdue checks */
  timezone: string;
  clock?: () => Date;
}

/**
 * Builds the Express application from its collaborators.
 * Nothing here reads the environment, so tests can pass in-memory stores.
 */
export function createApp(deps: AppDependencies): Express {
  const clientService = new ClientService(deps.clientStore, deps.invoiceStore, deps.clock);
  const invoiceService = new InvoiceService(deps.invoiceStore, deps.clientStore, new InvoicePdfService(), {
    timezone: deps.timezone,
    clock: deps.clock,
  });

  const app = express();
  app.use(cors({ origin: deps.corsOrigins, credentials: true }));
  app.use(express.json());

  app.use(createHealthRouter(API_VERSION, deps.checkDatabase));
  app.use('/api/auth', createAuthRouter(new AuthController(deps.identity)));
  app.use('/api/clients', createClientRouter(new ClientController(clientService), deps.identity));
  app.use('/api/invoices', createInvoiceRouter(new InvoiceController(invoiceService), deps.identity));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Route not found' });
  });

  // Malformed JSON bodies and anything a handler let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ message: 'Malformed JSON body' });
      return;
    }
    console.error('Unhandled request error:', err);
    sendError(res, err);
  });

  return app;
}
