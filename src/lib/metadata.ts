/**
 * Metadata resolution: turns the data dictionary and the instrument-event
 * mapping into the lookup tables the records-tree build runs on.
 *
 * Pure functions, no I/O.
 */

import type {
  ChoiceMap,
  FieldDefinition,
  FieldKind,
  InstrumentEventMapping,
  StudyMetadata,
} from "../types/study";

export const COMPLETION_SUFFIX = "_complete";

export const COMPLETION_CHOICES: ChoiceMap = new Map([
  ["0", "Incomplete"],
  ["1", "Unverified"],
  ["2", "Complete"],
]);

/** Default for a completion field that never received a value */
export const INCOMPLETE_LABEL = "Incomplete";

const YES_NO_CHOICES: ChoiceMap = new Map([
  ["1", "Yes"],
  ["0", "No"],
]);

const TRUE_FALSE_CHOICES: ChoiceMap = new Map([
  ["1", "True"],
  ["0", "False"],
]);

/** Synthetic completion-status field owned by every instrument */
export function completionField(instrument: string): string {
  return `${instrument}${COMPLETION_SUFFIX}`;
}

export function parseFieldKind(fieldType: string): FieldKind {
  switch (fieldType) {
    case "text":
    case "notes":
      return "text";
    case "dropdown":
    case "radio":
    case "checkbox":
    case "yesno":
    case "truefalse":
      return fieldType;
    default:
      return "other";
  }
}

/**
 * Parse a choices column: `"1, Male | 2, Female"`.
 * Labels may contain commas; only the first one separates code from label.
 * A segment without a comma is its own code and label.
 */
export function parseChoices(column: string): ChoiceMap {
  const choices = new Map<string, string>();

  for (const segment of column.split("|")) {
    if (segment.trim() === "") continue;

    const comma = segment.indexOf(",");
    if (comma === -1) {
      choices.set(segment.trim(), segment.trim());
    } else {
      choices.set(segment.slice(0, comma).trim(), segment.slice(comma + 1).trim());
    }
  }

  return choices;
}

/** Selector map entry for a field kind, if the kind is coded */
export function choicesForKind(kind: FieldKind, choicesColumn: string): ChoiceMap | undefined {
  switch (kind) {
    case "dropdown":
    case "radio":
    case "checkbox":
      return parseChoices(choicesColumn);
    case "yesno":
      return YES_NO_CHOICES;
    case "truefalse":
      return TRUE_FALSE_CHOICES;
    case "text":
    case "other":
      return undefined;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled field kind: ${String(unreachable)}`);
    }
  }
}

export function resolveMetadata(
  dataDictionary: readonly FieldDefinition[],
  eventMappings: readonly InstrumentEventMapping[]
): StudyMetadata {
  const fieldInstruments = new Map<string, string>();
  const instrumentFields = new Map<string, Set<string>>();
  const eventInstruments = new Map<string, Set<string>>();
  const fieldKinds = new Map<string, FieldKind>();
  const selectorMap = new Map<string, ChoiceMap>();

  for (const def of dataDictionary) {
    fieldInstruments.set(def.field_name, def.form_name);

    let fields = instrumentFields.get(def.form_name);
    if (!fields) {
      fields = new Set();
      instrumentFields.set(def.form_name, fields);
    }
    fields.add(def.field_name);

    const kind = parseFieldKind(def.field_type);
    fieldKinds.set(def.field_name, kind);

    const choices = choicesForKind(kind, def.select_choices_or_calculations);
    if (choices) {
      selectorMap.set(def.field_name, choices);
    }
  }

  // Completion fields are not part of the dictionary
  for (const [instrument, fields] of instrumentFields) {
    const field = completionField(instrument);
    fieldInstruments.set(field, instrument);
    fields.add(field);
    selectorMap.set(field, COMPLETION_CHOICES);
  }

  for (const mapping of eventMappings) {
    let instruments = eventInstruments.get(mapping.unique_event_name);
    if (!instruments) {
      instruments = new Set();
      eventInstruments.set(mapping.unique_event_name, instruments);
    }
    instruments.add(mapping.form);
  }

  return {
    recordIdField: dataDictionary[0]?.field_name ?? "",
    fieldInstruments,
    instrumentFields,
    eventInstruments,
    fieldKinds,
    selectorMap,
  };
}

/** Whether the field's values are codes to decode */
export function isChoiceField(metadata: StudyMetadata, field: string): boolean {
  return metadata.selectorMap.has(field);
}

export function isCompletionField(field: string, instrument: string): boolean {
  return field === completionField(instrument);
}
