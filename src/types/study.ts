/**
 * TypeScript types for study metadata, exported record rows and the
 * assembled records tree.
 *
 * Payload types are derived from Zod schemas for runtime validation.
 */

import { z } from "zod";

// ============================================================================
// Connector payload schemas (Zod) + derived types
// ============================================================================

// Exported cells are strings, except repeat instances which the service
// reports as a bare integer for the first instance.
export const CellValueSchema = z.union([z.string(), z.number(), z.null()]);
export type CellValue = z.infer<typeof CellValueSchema>;

// Data dictionary entry. Only the columns the resolver reads are declared;
// the rest of the dictionary row is passed through untouched.
export const FieldDefinitionSchema = z
  .object({
    field_name: z.string(),
    form_name: z.string(),
    field_type: z.string(),
    select_choices_or_calculations: z.string().nullish().transform((v) => v ?? ""),
  })
  .passthrough();
export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;

export const InstrumentEventMappingSchema = z.object({
  arm_num: z.coerce.number().int().optional(),
  unique_event_name: z.string(),
  form: z.string(),
});
export type InstrumentEventMapping = z.infer<typeof InstrumentEventMappingSchema>;

// One exported row, flat or EAV
export const RecordRowSchema = z.record(z.string(), CellValueSchema);
export type RecordRow = z.infer<typeof RecordRowSchema>;

export const RecordsModeSchema = z.enum(["flat", "eav"]);
export type RecordsMode = z.infer<typeof RecordsModeSchema>;

// ============================================================================
// Row column names
// ============================================================================

export const EVENT_COLUMN = "redcap_event_name";
export const REPEAT_INSTANCE_COLUMN = "redcap_repeat_instance";
export const REPEAT_INSTRUMENT_COLUMN = "redcap_repeat_instrument";
export const DATA_ACCESS_GROUP_FIELD = "redcap_data_access_group";

// EAV rows
export const EAV_SUBJECT_COLUMN = "record";
export const EAV_FIELD_COLUMN = "field_name";
export const EAV_VALUE_COLUMN = "value";

export const ROW_METADATA_COLUMNS: ReadonlySet<string> = new Set([
  EVENT_COLUMN,
  REPEAT_INSTANCE_COLUMN,
  REPEAT_INSTRUMENT_COLUMN,
]);

// ============================================================================
// Field kinds
// ============================================================================

export type FieldKind =
  | "text"
  | "dropdown"
  | "radio"
  | "checkbox"
  | "yesno"
  | "truefalse"
  | "other";

/** code -> label */
export type ChoiceMap = ReadonlyMap<string, string>;

// ============================================================================
// Resolved metadata
// ============================================================================

export interface StudyMetadata {
  /** Name of the first field in the data dictionary */
  recordIdField: string;
  fieldInstruments: ReadonlyMap<string, string>;
  /** Declared fields per instrument, completion field last */
  instrumentFields: ReadonlyMap<string, ReadonlySet<string>>;
  eventInstruments: ReadonlyMap<string, ReadonlySet<string>>;
  fieldKinds: ReadonlyMap<string, FieldKind>;
  selectorMap: ReadonlyMap<string, ChoiceMap>;
}

// ============================================================================
// Tuples
// ============================================================================

/** One (event, instrument, subject, instance, field, value) observation */
export interface CandidateTuple {
  event: string;
  /** null when the field belongs to no known instrument */
  instrument: string | null;
  subject: string;
  instance: string;
  field: string;
  value: string;
}

export interface AdmissibleTuple extends CandidateTuple {
  instrument: string;
  /** Raw value, or its label for choice fields */
  decoded: string;
}

// ============================================================================
// Error report
// ============================================================================

export const ERROR_CATEGORIES = [
  "choice value is missing",
  "choice value as text",
  "event is missing",
  "field not in a form",
  "form not in given event",
] as const;
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export interface RejectedTuple {
  event: string;
  subject: string;
  field: string;
  value: string;
  instrument: string | null;
}

// ============================================================================
// Records tree
// ============================================================================

/**
 * Ordinary fields collect every value they receive; completion-status
 * fields hold exactly one.
 */
export type FieldSlot =
  | { kind: "multi"; values: Set<string> }
  | { kind: "single"; value: string };

export type InstanceData = Map<string, FieldSlot>;
export type SubjectInstances = Map<string, InstanceData>;
export type InstrumentSubjects = Map<string, SubjectInstances>;
export type EventInstruments = Map<string, InstrumentSubjects>;

/** event -> instrument -> subject -> instance -> field -> slot */
export type RecordsTree = Map<string, EventInstruments>;

/** Plain-object rendering of a records tree, slot values sorted */
export type SerializedRecordsTree = Record<
  string,
  Record<string, Record<string, Record<string, Record<string, string[]>>>>
>;
