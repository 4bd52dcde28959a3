import { createApp } from './app';
import { SupabaseIdentityProvider } from './services/auth/identity.service';
import { PgClientStore } from './services/persistence/pg-client.store';
import { PgInvoiceStore } from './services/persistence/pg-invoice.store';
import { getConfig } from './utils/config';
import { closeDbConnection, getDbClient, testConnection } from './utils/database';

async function start(): Promise<void> {
  const config = getConfig();
  const db = getDbClient();

  await testConnection();

  const app = createApp({
    clientStore: new PgClientStore(db),
    invoiceStore: new PgInvoiceStore(db),
    identity: new SupabaseIdentityProvider(),
    checkDatabase: async () => {
      await db.query('SELECT 1');
    },
    corsOrigins: config.corsOrigins,
    timezone: config.timezone,
  });

  const server = app.listen(config.port, config.host, () => {
    console.log(`✅ Server listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close(() => {
      closeDbConnection()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('Shutdown error:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  console.error('❌ Server failed to start:', err);
  process.exit(1);
});
