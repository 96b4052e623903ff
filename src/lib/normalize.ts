/**
 * Row normalization: one exported row (flat or EAV) in, zero or more
 * (event, instrument, subject, instance, field, value) tuples out.
 *
 * Pure function: no I/O and no validation against metadata beyond what is
 * needed to attribute a field to its instrument.
 */

import {
  EAV_FIELD_COLUMN,
  EAV_SUBJECT_COLUMN,
  EAV_VALUE_COLUMN,
  EVENT_COLUMN,
  REPEAT_INSTANCE_COLUMN,
  REPEAT_INSTRUMENT_COLUMN,
  ROW_METADATA_COLUMNS,
  type CandidateTuple,
  type CellValue,
  type RecordRow,
  type RecordsMode,
  type StudyMetadata,
} from "../types/study";

export interface NormalizedRow {
  /** Always reported, even when the row yields no tuples */
  subject: string;
  tuples: CandidateTuple[];
}

// ---------------------------------------------------------------------------
// Cell coercion
// ---------------------------------------------------------------------------

/**
 * The one place repeat-instance markers are read. The service reports the
 * first instance as 1, later ones as "2", "3"..., and sometimes "" or
 * nothing at all.
 */
export function canonicalInstance(raw: CellValue | undefined): string {
  if (raw === undefined || raw === null || raw === "" || raw === 0) return "1";
  return String(raw);
}

export function cellText(raw: CellValue | undefined): string {
  if (raw === undefined || raw === null) return "";
  return String(raw);
}

// ---------------------------------------------------------------------------
// Checkboxes
// ---------------------------------------------------------------------------

const CHECKBOX_SEPARATOR = "___";

/**
 * Split a flat-export checkbox column `<base>___<option>`.
 * Returns null unless `<base>` is a coded field.
 */
export function splitCheckboxField(
  column: string,
  metadata: StudyMetadata
): { base: string; option: string } | null {
  const at = column.lastIndexOf(CHECKBOX_SEPARATOR);
  if (at <= 0) return null;

  const base = column.slice(0, at);
  const option = column.slice(at + CHECKBOX_SEPARATOR.length);
  if (option === "" || !metadata.selectorMap.has(base)) return null;

  return { base, option };
}

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export function normalizeRow(
  row: RecordRow,
  mode: RecordsMode,
  metadata: StudyMetadata
): NormalizedRow {
  return mode === "eav" ? normalizeEavRow(row, metadata) : normalizeFlatRow(row, metadata);
}

function repeatInstrumentOf(row: RecordRow): string | null {
  const name = cellText(row[REPEAT_INSTRUMENT_COLUMN]);
  return name === "" ? null : name;
}

function normalizeEavRow(row: RecordRow, metadata: StudyMetadata): NormalizedRow {
  const subject = cellText(row[EAV_SUBJECT_COLUMN]);
  const field = cellText(row[EAV_FIELD_COLUMN]);

  return {
    subject,
    tuples: [
      {
        event: cellText(row[EVENT_COLUMN]),
        instrument: repeatInstrumentOf(row) ?? metadata.fieldInstruments.get(field) ?? null,
        subject,
        instance: canonicalInstance(row[REPEAT_INSTANCE_COLUMN]),
        field,
        value: cellText(row[EAV_VALUE_COLUMN]),
      },
    ],
  };
}

function normalizeFlatRow(row: RecordRow, metadata: StudyMetadata): NormalizedRow {
  const event = cellText(row[EVENT_COLUMN]);
  const instance = canonicalInstance(row[REPEAT_INSTANCE_COLUMN]);
  const repeatInstrument = repeatInstrumentOf(row);
  const subject = cellText(row[metadata.recordIdField]);
  const eventInstruments = metadata.eventInstruments.get(event);

  const tuples: CandidateTuple[] = [];

  for (const [column, cell] of Object.entries(row)) {
    if (ROW_METADATA_COLUMNS.has(column) || column === metadata.recordIdField) continue;

    let field = column;
    let value = cellText(cell);

    const checkbox = splitCheckboxField(column, metadata);
    if (checkbox) {
      if (value === "" || value === "0") continue; // not selected
      field = checkbox.base;
      value = checkbox.option;
    }

    const owner = metadata.fieldInstruments.get(field);
    const instrument = repeatInstrument ?? owner ?? null;

    // Flat exports carry every column on every row. An empty cell only
    // counts when its instrument belongs here.
    if (value === "") {
      const mapped = instrument !== null && eventInstruments?.has(instrument) === true;
      const ownField = owner === undefined || owner === instrument;
      if (!mapped || !ownField) continue;
    }

    tuples.push({ event, instrument, subject, instance, field, value });
  }

  return { subject, tuples };
}
