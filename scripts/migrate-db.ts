import { getDatabasePath } from '@/config/server';
import { closeDb, getConnection, initDb } from '@/lib/db';
import { getNextInvoiceNumber } from '@/lib/invoices/numbering';
import { listTables } from '@/lib/db/migrate';

/**
 * Creates or upgrades the database file and prints what is in it.
 * Opening the database applies any missing tables and columns.
 */
async function main(): Promise<void> {
  const databasePath = getDatabasePath();
  initDb(databasePath);

  try {
    console.log(`Database: ${databasePath}`);
    console.log('name\trows');
    for (const table of listTables(getConnection())) {
      console.log(`${table.name}\t${table.rows}`);
    }
    console.log(`Next invoice number: ${getNextInvoiceNumber()}`);
  } finally {
    closeDb();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
