import {readFile} from 'node:fs/promises';
import {fileURLToPath} from 'node:url';
import type {Client} from '@libsql/client';

const schemaPath = fileURLToPath(new URL('../sql/schema.sql', import.meta.url));

/**
 * Creates every table and index that does not exist yet. Safe to run against
 * a database that is already up to date.
 */
export async function applySchema(client: Client): Promise<void> {
  const ddl = await readFile(schemaPath, 'utf8');
  await client.executeMultiple(ddl);
}
