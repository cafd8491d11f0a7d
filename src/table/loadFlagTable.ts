import Ajv from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import { promises as fs } from 'node:fs';

import { err, ok, type Result } from '../util/result';
import type { FlagTable } from './flagTable';
import tableSchema from './flag-table-v1.json';

const ajv = new Ajv({ allErrors: true, strict: false });
const validate = ajv.compile<FlagTable>(tableSchema);

function formatError(e: ErrorObject): string {
  const where = e.instancePath === '' ? '/' : e.instancePath;
  if (e.keyword === 'additionalProperties' && typeof e.params.additionalProperty === 'string') {
    return `${where}: unknown property "${e.params.additionalProperty}"`;
  }
  return `${where}: ${e.message ?? e.keyword}`;
}

/** Checks a parsed JSON value against the flag-table-v1 schema. */
export function validateFlagTable(value: unknown): Result<FlagTable, string[]> {
  if (validate(value)) return ok(value);
  const messages = (validate.errors ?? []).map(formatError);
  // allErrors reports each failing branch; keep the list short and stable.
  return err(Array.from(new Set(messages)).sort());
}

export function parseFlagTable(text: string): Result<FlagTable, string[]> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e: unknown) {
    return err([`invalid JSON: ${e instanceof Error ? e.message : String(e)}`]);
  }
  return validateFlagTable(value);
}

export async function loadFlagTableFile(filePath: string): Promise<Result<FlagTable, string[]>> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseFlagTable(text);
}
