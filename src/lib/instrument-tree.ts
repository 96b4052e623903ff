import type { FieldDefinition, InstrumentEventMapping } from "../types/study";

export interface InstrumentNode {
  /** Events the instrument is mapped to, sorted */
  events: string[];
  /** Dictionary rows keyed by field name, minus the name columns */
  fields: Record<string, Record<string, unknown>>;
}

export type InstrumentTree = Record<string, InstrumentNode>;

/**
 * Group study metadata by instrument:
 *
 *   { <instrument>: { events: [...], fields: { <field>: {...} } } }
 */
export function buildInstrumentTree(
  dataDictionary: readonly FieldDefinition[],
  eventMappings: readonly InstrumentEventMapping[]
): InstrumentTree {
  const fields = new Map<string, Record<string, Record<string, unknown>>>();
  const events = new Map<string, Set<string>>();

  const ensure = (instrument: string) => {
    if (!fields.has(instrument)) fields.set(instrument, {});
    if (!events.has(instrument)) events.set(instrument, new Set());
  };

  for (const def of dataDictionary) {
    const { field_name: fieldName, form_name: instrument, ...info } = def;
    ensure(instrument);
    const instrumentFields = fields.get(instrument);
    if (instrumentFields) instrumentFields[fieldName] = info;
  }

  for (const mapping of eventMappings) {
    ensure(mapping.form);
    events.get(mapping.form)?.add(mapping.unique_event_name);
  }

  const tree: InstrumentTree = {};
  for (const [instrument, instrumentFields] of fields) {
    tree[instrument] = {
      events: [...(events.get(instrument) ?? [])].sort(),
      fields: instrumentFields,
    };
  }
  return tree;
}
