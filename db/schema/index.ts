/**
 * Central export for all database schemas.
 *
 * When adding a new table:
 * 1. Create db/schema/<table>.ts
 * 2. Export the schema from that file
 * 3. Add the export to this file and a CREATE TABLE to lib/db/migrate.ts
 */

export * from './clients';
export * from './jobs';
export * from './company_settings';
export * from './goals';
export * from './invoice_sequences';
