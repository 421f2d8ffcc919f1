// Parsed quasi-JSON. Objects are Maps so key insertion order survives
// (port-count inference depends on it). Hex integers past 2^53 stay exact
// as bigint; wide port bitmasks need every bit.
export type Tree = number | bigint | string | null | Tree[] | TreeMap
export type TreeMap = Map<string, Tree>

export type FieldKind =
  | 'bool'
  | 'scalar_bool'
  | 'int'
  | 'uint64'
  | 'str'
  | 'option'
  | 'bool_option'
  | 'bitshift_option'
  | 'mac'
  | 'partner_mac'
  | 'ip'
  | 'partner_ip'
  | 'sfp_type'
  | 'dbm'

type Keys = readonly [string, ...string[]]

interface FieldBase {
  name: string
  /** Source keys tried in order; the first one present in the response wins. */
  keys: Keys
}

/** Set on element-wise fields whose raw value is a per-port list. */
interface PerPort {
  perPort?: boolean
}

/** Bitmask fields decode to this many positions instead of the record's port count. */
interface PortsOverride {
  ports?: number
}

export interface BoolField extends FieldBase, PortsOverride {
  kind: 'bool'
}

export interface ScalarBoolField extends FieldBase {
  kind: 'scalar_bool'
}

export interface IntField extends FieldBase, PerPort {
  kind: 'int'
  /** Two's-complement width; values at or above 2^(bits-1) become negative. */
  signedBits?: number
  /** Divisor; a scaled field always yields a real number. */
  scale?: number
}

export interface Uint64Field extends FieldBase, PerPort {
  kind: 'uint64'
  /** Key holding the upper 32 bits. */
  high: string
}

export interface StrField extends FieldBase, PerPort {
  kind: 'str'
}

export interface OptionField extends FieldBase, PerPort {
  kind: 'option'
  options: readonly string[]
}

export interface BoolOptionField extends FieldBase, PortsOverride {
  kind: 'bool_option'
  options: readonly [string, string]
}

export interface BitshiftOptionField extends FieldBase, PortsOverride {
  kind: 'bitshift_option'
  /** Key holding the high bit of each port's 2-bit index. */
  pair: string
  options: readonly string[]
}

export interface MacField extends FieldBase {
  kind: 'mac'
}

export interface PartnerMacField extends FieldBase, PerPort {
  kind: 'partner_mac'
}

export interface IpField extends FieldBase {
  kind: 'ip'
}

export interface PartnerIpField extends FieldBase, PerPort {
  kind: 'partner_ip'
}

export interface SfpTypeField extends FieldBase, PerPort {
  kind: 'sfp_type'
}

export interface DbmField extends FieldBase, PerPort {
  kind: 'dbm'
  scale?: number
}

export type FieldDescriptor =
  | BoolField
  | ScalarBoolField
  | IntField
  | Uint64Field
  | StrField
  | OptionField
  | BoolOptionField
  | BitshiftOptionField
  | MacField
  | PartnerMacField
  | IpField
  | PartnerIpField
  | SfpTypeField
  | DbmField

export type Fields = readonly FieldDescriptor[]

export interface RecordSchema<F extends Fields = Fields> {
  /** Shown in error messages. */
  name: string
  fields: F
}

type Shaped<F, T> =
  F extends { perPort: true } ? T[] :
  F extends { perPort?: false } ? T :
  T | T[]

type Label<O> = O extends readonly (infer L)[] ? L : never

export type FieldValue<F extends FieldDescriptor> =
  F extends BoolField ? boolean[] :
  F extends ScalarBoolField ? boolean :
  F extends IntField | Uint64Field | DbmField ? Shaped<F, number> :
  F extends OptionField ? Shaped<F, Label<F['options']> | null> :
  F extends BoolOptionField | BitshiftOptionField ? Label<F['options']>[] :
  F extends MacField | IpField ? string :
  F extends StrField | PartnerMacField | PartnerIpField | SfpTypeField ? Shaped<F, string> :
  never

/** A decoded record; fields whose keys were absent from the response are null. */
export type DecodedRecord<F extends Fields> = {
  [D in F[number] as D['name']]: FieldValue<D> | null
}

export type RecordOf<S> = S extends RecordSchema<infer F> ? DecodedRecord<F> : never

export type DecodedScalar = number | string | boolean | null
export type DecodedValue = DecodedScalar | DecodedScalar[]

/** Untyped view of a record, for code that walks fields generically. */
export type AnyRecord = Readonly<Record<string, DecodedValue>>

export interface RecordEndpoint<F extends Fields = Fields> {
  mode: 'record'
  name: string
  /** Primary path, e.g. "!stats.b". */
  path: string
  /** Paths other firmware variants use for the same data. */
  alternates: readonly string[]
  schema: RecordSchema<F>
}

export interface TableEndpoint<F extends Fields = Fields> {
  mode: 'table'
  name: string
  path: string
  alternates: readonly string[]
  /** Schema of one table entry. */
  schema: RecordSchema<F>
}

export type Endpoint = RecordEndpoint | TableEndpoint

export type DecodeOutcome =
  | { mode: 'record'; endpoint: RecordEndpoint; record: AnyRecord }
  | { mode: 'table'; endpoint: TableEndpoint; entries: AnyRecord[] }

export type ViewMode = 'table' | 'tree' | 'chart'
