/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

export type SchemaName = 'financial_snapshot.v1' | 'assumption_input.v1' | 'valuation_config.v1';

const SCHEMA_DIR = new URL('../../schemas/', import.meta.url);
const schemaCache = new Map<SchemaName, Schema>();

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = fileURLToPath(new URL(`${schemaName}.schema.json`, SCHEMA_DIR));
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}
