import { asc, eq } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { clients, type Client } from '@/db/schema/clients';
import { ok, err, type Result } from '@/lib/result';

export async function listClients(db: DbExecutor = getDb()): Promise<Result<Client[]>> {
  try {
    const rows = await db.select().from(clients).orderBy(asc(clients.name), asc(clients.id));
    return ok(rows);
  } catch (error) {
    console.error('Error listing clients:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to fetch clients', error);
  }
}

export async function getClientById(clientId: number, db: DbExecutor = getDb()): Promise<Result<Client>> {
  try {
    const [row] = await db.select().from(clients).where(eq(clients.id, clientId)).limit(1);

    if (!row) {
      return err('NOT_FOUND', 'Client not found');
    }

    return ok(row);
  } catch (error) {
    console.error('Error fetching client:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to fetch client', error);
  }
}
