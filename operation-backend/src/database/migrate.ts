import 'dotenv/config';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { loadBackendConfig } from '../config/index.js';
import { DatabaseClient } from './client.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

async function migrate(): Promise<void> {
  const db = new DatabaseClient(loadBackendConfig().database);
  try {
    console.log('Running database migration...');

    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    await db.query(schema);
    console.log('Migration finished');
  } finally {
    await db.close();
  }
}

migrate().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error('Migration failed:', error);
    process.exit(1);
  }
);
