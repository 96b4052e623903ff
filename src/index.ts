export { buildRecordsTree, assembleRecordsTree, backfillTree, serializeRecordsTree, fieldValues } from "./lib/records-tree";
export type { BuildOptions, RecordsTreeResult } from "./lib/records-tree";
export { ErrorReport, classifyTuple } from "./lib/classify";
export { HttpStudyConnector } from "./lib/connector";
export type { StudyConnector, RecordsRequest, HttpStudyConnectorOptions } from "./lib/connector";
export { fetchAllRows } from "./lib/batch-fetcher";
export { resolveMetadata, parseChoices, parseFieldKind, completionField } from "./lib/metadata";
export { buildInstrumentTree } from "./lib/instrument-tree";
export type { InstrumentTree, InstrumentNode } from "./lib/instrument-tree";
export { normalizeRow, canonicalInstance } from "./lib/normalize";
export { loadConfig } from "./lib/config";
export type { StudyConfig } from "./lib/config";
export {
  StudyApiError,
  BatchTooLargeError,
  BatchSizeExhaustedError,
  PayloadValidationError,
  ConfigError,
} from "./lib/errors";
export type * from "./types/study";
export { ERROR_CATEGORIES, RecordsModeSchema } from "./types/study";
