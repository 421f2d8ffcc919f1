export class SwitchOsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The response text is not valid quasi-JSON. */
export class ParseError extends SwitchOsError {
  readonly offset: number
  readonly line: number
  readonly column: number

  constructor(message: string, source: string, offset: number) {
    const before = source.slice(0, offset).split('\n')
    const line = before.length
    const column = before[before.length - 1].length + 1
    super(`${message} at line ${line}, column ${column}`)
    this.offset = offset
    this.line = line
    this.column = column
  }
}

/** A response or schema does not have the shape the schema declares. */
export class SchemaError extends SwitchOsError {}

/** A present field's raw value could not be transformed under its declared kind. */
export class FieldDecodeError extends SwitchOsError {
  readonly schema: string
  readonly field: string
  readonly key: string

  constructor(schema: string, field: string, key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`${schema}: cannot decode field '${field}' (${key}): ${reason}`, { cause })
    this.schema = schema
    this.field = field
    this.key = key
  }
}

export type ErrorKind = 'ParseError' | 'SchemaError' | 'FieldDecodeError'

export function errorKind(err: SwitchOsError): ErrorKind {
  if (err instanceof ParseError) return 'ParseError'
  if (err instanceof FieldDecodeError) return 'FieldDecodeError'
  return 'SchemaError'
}
