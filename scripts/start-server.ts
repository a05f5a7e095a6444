import { getDatabasePath, getServerHost, getServerPort } from '@/config/server';
import { closeDb, initDb } from '@/lib/db';
import { loadAppSettings } from '@/lib/settings/appSettings';
import { createRouter } from '@/lib/http/router';
import { createHttpServer } from '@/lib/http/nodeServer';

async function main(): Promise<void> {
  const databasePath = getDatabasePath();
  initDb(databasePath);

  const settings = await loadAppSettings();
  if (!settings.ok) {
    throw new Error(`Failed to load settings: ${settings.error.message}`);
  }

  const host = getServerHost();
  const port = getServerPort();
  const router = createRouter();
  const server = createHttpServer(router.handle, `http://${host}:${port}`);

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close((error) => {
      closeDb();
      if (error) {
        console.error('Error while closing server:', error);
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(port, host, () => {
    console.log(`Invoicing API listening on http://${host}:${port}`);
    console.log(`Database: ${databasePath}`);
  });
}

main().catch((error) => {
  console.error(error);
  closeDb();
  process.exitCode = 1;
});
