import type { Fields, RecordEndpoint, RecordSchema, TableEndpoint } from './types'

/** Keeps every literal (names, keys, option labels) so record types can be derived from the schema. */
export function defineSchema<const F extends Fields>(name: string, fields: F): RecordSchema<F> {
  return { name, fields }
}

export function recordEndpoint<F extends Fields>(
  path: string,
  alternates: readonly string[],
  schema: RecordSchema<F>,
): RecordEndpoint<F> {
  return { mode: 'record', name: schema.name, path, alternates, schema }
}

export function tableEndpoint<F extends Fields>(
  name: string,
  path: string,
  alternates: readonly string[],
  schema: RecordSchema<F>,
): TableEndpoint<F> {
  return { mode: 'table', name, path, alternates, schema }
}
