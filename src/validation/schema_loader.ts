/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv/dist/2020';

export type SchemaName =
  | 'signals_config.v1'
  | 'market_snapshot.v1'
  | 'sector_map.v1'
  | 'signal_run.v1';

const schemaCache = new Map<SchemaName, SchemaObject>();

export function schemaPath(schemaName: SchemaName): string {
  return join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
}

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaJson = readFileSync(schemaPath(schemaName), 'utf-8');
  const schema: SchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
