import * as fs from 'fs';
import * as path from 'path';
import { config } from '../src/config/config';
import { Database } from '../src/config/database';
import { logError, logger } from '../src/utils/logger';

// From ts sources the schema sits beside this file; compiled output runs from dist/database
const SCHEMA_CANDIDATES = [
  path.join(__dirname, 'schema.sql'),
  path.join(__dirname, '..', '..', 'database', 'schema.sql'),
];

function readSchema(): string {
  const schemaPath = SCHEMA_CANDIDATES.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`schema.sql not found (looked in ${SCHEMA_CANDIDATES.join(', ')})`);
  }
  return fs.readFileSync(schemaPath, 'utf-8');
}

/**
 * Create the users table and its indexes. The schema is idempotent.
 */
async function migrate(db: Database): Promise<void> {
  const schemaSql = readSchema();

  if (!(await db.testConnection())) {
    throw new Error('Database connection failed');
  }

  logger.info('Applying schema.sql');
  await db.query(schemaSql);

  const result = await db.query<{ column_name: string }>(
    `SELECT column_name
       FROM information_schema.columns
      WHERE table_schema = 'public' AND table_name = 'users'
      ORDER BY ordinal_position`
  );

  logger.info('Migration complete', {
    usersColumns: result.rows.map((row) => row.column_name),
  });
}

const db = new Database(config.database);

migrate(db)
  .then(() => db.close())
  .then(() => process.exit(0))
  .catch(async (error: unknown) => {
    logError('Migration failed', error);
    await db.close().catch((closeError: unknown) => {
      logError('Database pool did not close cleanly', closeError);
    });
    process.exit(1);
  });
