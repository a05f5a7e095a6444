import type Database from 'better-sqlite3';
import { z } from 'zod';

export const COMPANY_SETTINGS_SEED = {
  companyName: 'Your Company',
  ownerName: 'Owner Name',
  address: '123 Main Street, Springfield',
  phone: '555-0100',
  email: 'billing@example.com',
  defaultHourlyRate: 140,
} as const;

export const GOALS_SEED = {
  yearlyNetGoal: 30000,
  yearlyGrossGoal: 43500,
  taxRate: 0.31,
} as const;

const CREATE_TABLES = [
  `CREATE TABLE IF NOT EXISTS clients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT,
    phone TEXT,
    address TEXT,
    hourly_rate REAL NOT NULL DEFAULT 140.00,
    notes TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    client_id INTEGER NOT NULL,
    job_date DATE NOT NULL,
    description TEXT NOT NULL,
    hours REAL NOT NULL,
    hourly_rate REAL NOT NULL,
    total REAL NOT NULL,
    notes TEXT,
    status TEXT DEFAULT 'draft',
    invoice_number INTEGER,
    invoice_status TEXT DEFAULT 'draft',
    invoice_sent_date DATE,
    invoice_paid_date DATE,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (client_id) REFERENCES clients (id)
  )`,
  `CREATE TABLE IF NOT EXISTS company_settings (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    company_name TEXT NOT NULL,
    owner_name TEXT NOT NULL,
    address TEXT NOT NULL,
    phone TEXT NOT NULL,
    email TEXT NOT NULL,
    default_hourly_rate REAL NOT NULL DEFAULT 140.00,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS goals (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    yearly_net_goal REAL NOT NULL DEFAULT 30000.00,
    yearly_gross_goal REAL NOT NULL DEFAULT 43500.00,
    tax_rate REAL NOT NULL DEFAULT 0.31,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS invoice_sequences (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    next_number INTEGER NOT NULL DEFAULT 1,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
];

/**
 * Columns added after the first schema version. Databases created before a
 * column existed get it through ALTER TABLE on startup.
 */
export const COLUMN_ADDITIONS: ReadonlyArray<{ table: string; column: string; definition: string }> = [
  { table: 'clients', column: 'address', definition: 'TEXT' },
  { table: 'jobs', column: 'invoice_number', definition: 'INTEGER' },
  { table: 'jobs', column: 'invoice_status', definition: "TEXT DEFAULT 'draft'" },
  { table: 'jobs', column: 'invoice_sent_date', definition: 'DATE' },
  { table: 'jobs', column: 'invoice_paid_date', definition: 'DATE' },
];

const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS clients_name_idx ON clients (name)',
  'CREATE INDEX IF NOT EXISTS jobs_client_id_idx ON jobs (client_id)',
  'CREATE INDEX IF NOT EXISTS jobs_job_date_idx ON jobs (job_date)',
];

const CREATE_INVOICE_NUMBER_UNIQUE_INDEX =
  'CREATE UNIQUE INDEX IF NOT EXISTS jobs_invoice_number_unique ON jobs (invoice_number)';

// Fallback for files that already hold duplicate numbers. Assigned numbers are never rewritten.
const CREATE_INVOICE_NUMBER_INDEX = 'CREATE INDEX IF NOT EXISTS jobs_invoice_number_idx ON jobs (invoice_number)';

const invoiceNumberRowsSchema = z.array(z.object({ invoice_number: z.number() }));

/**
 * Invoice numbers carried by more than one job, in ascending order.
 */
export function findDuplicateInvoiceNumbers(sqlite: Database.Database): number[] {
  const rows = invoiceNumberRowsSchema.parse(
    sqlite
      .prepare(
        `SELECT invoice_number FROM jobs
         WHERE invoice_number IS NOT NULL
         GROUP BY invoice_number
         HAVING COUNT(*) > 1
         ORDER BY invoice_number`
      )
      .all()
  );
  return rows.map((row) => row.invoice_number);
}

const tableInfoSchema = z.array(z.object({ name: z.string() }).passthrough());

export function listColumns(sqlite: Database.Database, table: string): string[] {
  const rows = tableInfoSchema.parse(sqlite.pragma(`table_info(${table})`));
  return rows.map((row) => row.name);
}

const tableNameRowsSchema = z.array(z.object({ name: z.string() }));
const rowCountSchema = z.object({ row_count: z.number() });

/**
 * User tables in the database with their row counts, by name.
 */
export function listTables(sqlite: Database.Database): Array<{ name: string; rows: number }> {
  const tables = tableNameRowsSchema.parse(
    sqlite
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
  );
  return tables.map((table) => ({
    name: table.name,
    rows: rowCountSchema.parse(sqlite.prepare(`SELECT COUNT(*) AS row_count FROM "${table.name}"`).get()).row_count,
  }));
}

/**
 * Brings a database file up to the current schema. Safe to run on every start:
 * tables are created only when missing, columns are added only after checking
 * `table_info`, and seed rows use INSERT OR IGNORE.
 *
 * @returns the columns that were added, as `table.column`
 */
export function ensureSchema(sqlite: Database.Database): string[] {
  const added: string[] = [];

  const apply = sqlite.transaction(() => {
    for (const statement of CREATE_TABLES) {
      sqlite.exec(statement);
    }

    for (const addition of COLUMN_ADDITIONS) {
      const existing = listColumns(sqlite, addition.table);
      if (existing.includes(addition.column)) continue;
      sqlite.exec(`ALTER TABLE ${addition.table} ADD COLUMN ${addition.column} ${addition.definition}`);
      added.push(`${addition.table}.${addition.column}`);
    }

    for (const statement of CREATE_INDEXES) {
      sqlite.exec(statement);
    }

    const duplicates = findDuplicateInvoiceNumbers(sqlite);
    if (duplicates.length > 0) {
      console.warn('Duplicate invoice numbers found; invoice_number is indexed without a unique constraint:', {
        invoiceNumbers: duplicates,
      });
      sqlite.exec(CREATE_INVOICE_NUMBER_INDEX);
    } else {
      sqlite.exec(CREATE_INVOICE_NUMBER_UNIQUE_INDEX);
    }

    sqlite
      .prepare(
        `INSERT OR IGNORE INTO company_settings
          (id, company_name, owner_name, address, phone, email, default_hourly_rate)
         VALUES (1, @companyName, @ownerName, @address, @phone, @email, @defaultHourlyRate)`
      )
      .run(COMPANY_SETTINGS_SEED);

    sqlite
      .prepare(
        `INSERT OR IGNORE INTO goals (id, yearly_net_goal, yearly_gross_goal, tax_rate)
         VALUES (1, @yearlyNetGoal, @yearlyGrossGoal, @taxRate)`
      )
      .run(GOALS_SEED);

    sqlite.exec(
      `INSERT OR IGNORE INTO invoice_sequences (id, next_number)
       SELECT 1, COALESCE(MAX(invoice_number), 0) + 1 FROM jobs`
    );
  });

  apply();
  return added;
}
