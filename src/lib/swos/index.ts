export type {
  AnyRecord,
  DecodedRecord,
  DecodedValue,
  DecodeOutcome,
  Endpoint,
  FieldDescriptor,
  FieldKind,
  Fields,
  RecordEndpoint,
  RecordOf,
  RecordSchema,
  TableEndpoint,
  Tree,
  TreeMap,
  ViewMode,
} from './types'
export type { ErrorKind } from './errors'
export { SwitchOsError, ParseError, SchemaError, FieldDecodeError, errorKind } from './errors'
export { parseQuasiJson, isTreeMap } from './quasiJson'
export { DEFAULT_PORT_COUNT, inferPortCount, decodeOne, decodeList, parseRecord, parseRecordList } from './decoder'
export { defineSchema, recordEndpoint, tableEndpoint } from './schema'
export { EndpointRegistry, registry, sourceKeys } from './registry'
export { DEVICE_MODELS, DEVICE_PORT_COUNTS, generateResponse, portName } from './sample'
export * from './endpoints'
