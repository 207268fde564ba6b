import { readFile } from 'fs/promises'
import type { SqlClient } from './client.js'

export const SCHEMA_PATH = new URL('./schema.sql', import.meta.url)

export async function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_PATH, 'utf8')
}

/**
 * Create tables and indexes if they do not exist yet.
 */
export async function applySchema(client: SqlClient): Promise<void> {
  const sql = await readSchemaSql()
  await client.query(sql)
}
