/**
 * Records tree assembly.
 *
 * Builds the nested view of every study record:
 *
 *   {
 *     <event>: {
 *       <instrument>: {
 *         <subject>: {
 *           <instance>: {
 *             <field>: slot,   // set of values, or one completion status
 *             ...
 *
 * After all rows are in, the tree is backfilled so that every mapped
 * event/instrument has an entry for every subject and every instance
 * carries every field of its instrument.
 */

import { ErrorReport, classifyTuple, type ClassifyOptions } from "./classify";
import type { StudyConnector } from "./connector";
import { fetchAllRows } from "./batch-fetcher";
import { INCOMPLETE_LABEL, isCompletionField, resolveMetadata } from "./metadata";
import { normalizeRow } from "./normalize";
import type {
  AdmissibleTuple,
  FieldSlot,
  InstanceData,
  RecordRow,
  RecordsMode,
  RecordsTree,
  SerializedRecordsTree,
  StudyMetadata,
} from "../types/study";

export interface BuildOptions extends ClassifyOptions {
  /** Export shape to request; defaults to flat */
  mode?: RecordsMode;
  /** Restrict the export to these fields */
  fields?: readonly string[];
}

export interface RecordsTreeResult {
  readonly tree: RecordsTree;
  readonly errors: ErrorReport;
}

/**
 * Everything one build owns. Created per build, never shared.
 */
export interface BuildContext {
  metadata: StudyMetadata;
  mode: RecordsMode;
  classify: ClassifyOptions;
  tree: RecordsTree;
  errors: ErrorReport;
  /** Every subject seen, first-seen order */
  subjects: Set<string>;
}

export function createBuildContext(
  metadata: StudyMetadata,
  options: BuildOptions = {},
  subjects: Iterable<string> = []
): BuildContext {
  return {
    metadata,
    mode: options.mode ?? "flat",
    classify: { rawSelectors: options.rawSelectors ?? false },
    tree: new Map(),
    errors: new ErrorReport(),
    subjects: new Set(subjects),
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function child<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

function instanceData(
  tree: RecordsTree,
  event: string,
  instrument: string,
  subject: string,
  instance: string
): InstanceData {
  const instruments = child(tree, event, () => new Map());
  const subjects = child(instruments, instrument, () => new Map());
  const instances = child(subjects, subject, () => new Map());
  return child(instances, instance, () => new Map());
}

/** Slot values, sorted */
export function fieldValues(slot: FieldSlot): string[] {
  switch (slot.kind) {
    case "multi":
      return [...slot.values].sort();
    case "single":
      return [slot.value];
  }
}

// ---------------------------------------------------------------------------
// Insertion
// ---------------------------------------------------------------------------

export function insertTuple(tree: RecordsTree, tuple: AdmissibleTuple, metadata: StudyMetadata): void {
  const { event, instrument, subject, instance, field, decoded } = tuple;
  // The identifier's value is the subject key; backfill gives the field ""
  if (field === metadata.recordIdField) return;

  const data = instanceData(tree, event, instrument, subject, instance);

  if (isCompletionField(field, instrument)) {
    data.set(field, { kind: "single", value: decoded });
    return;
  }

  const slot = data.get(field);
  if (slot?.kind === "multi") {
    slot.values.add(decoded);
  } else {
    data.set(field, { kind: "multi", values: new Set([decoded]) });
  }
}

/**
 * Normalize, classify and insert one exported row.
 */
export function ingestRow(context: BuildContext, row: RecordRow): void {
  const { subject, tuples } = normalizeRow(row, context.mode, context.metadata);
  context.subjects.add(subject);

  for (const tuple of tuples) {
    const admitted = classifyTuple(tuple, context.metadata, context.errors, context.classify);
    if (admitted) {
      insertTuple(context.tree, admitted, context.metadata);
    }
  }
}

// ---------------------------------------------------------------------------
// Backfill
// ---------------------------------------------------------------------------

function emptySlot(field: string, instrument: string): FieldSlot {
  return isCompletionField(field, instrument)
    ? { kind: "single", value: INCOMPLETE_LABEL }
    : { kind: "multi", values: new Set([""]) };
}

/**
 * Give every subject an instance "1" under each mapped event/instrument it
 * has no data for, then fill every missing field: "" for data fields,
 * "Incomplete" for the completion status. Safe to run more than once.
 */
export function backfillTree(
  tree: RecordsTree,
  metadata: StudyMetadata,
  subjects: Iterable<string>
): void {
  const allSubjects = [...subjects];
  if (allSubjects.length === 0) return;

  for (const [event, instruments] of metadata.eventInstruments) {
    const eventData = child(tree, event, () => new Map());

    for (const instrument of instruments) {
      const bySubject = child(eventData, instrument, () => new Map());
      const fields = metadata.instrumentFields.get(instrument) ?? new Set<string>();

      for (const subject of allSubjects) {
        const instances = child(bySubject, subject, () => new Map());
        if (instances.size === 0) {
          instances.set("1", new Map());
        }

        for (const data of instances.values()) {
          for (const field of fields) {
            if (!data.has(field)) {
              data.set(field, emptySlot(field, instrument));
            }
          }
        }
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/**
 * Assemble a tree from rows already in hand.
 */
export function assembleRecordsTree(
  metadata: StudyMetadata,
  rows: Iterable<RecordRow>,
  options: BuildOptions = {},
  subjects: Iterable<string> = []
): RecordsTreeResult {
  const context = createBuildContext(metadata, options, subjects);

  for (const row of rows) {
    ingestRow(context, row);
  }
  backfillTree(context.tree, metadata, context.subjects);

  return Object.freeze({ tree: context.tree, errors: context.errors });
}

/**
 * Fetch metadata and every record, and return the records tree with the
 * report of everything that did not fit the metadata. Connector failures
 * propagate; nothing partial is returned.
 */
export async function buildRecordsTree(
  connector: StudyConnector,
  options: BuildOptions = {}
): Promise<RecordsTreeResult> {
  const dataDictionary = await connector.getDataDictionary();
  const eventMappings = await connector.getInstrumentEventMappings();
  const metadata = resolveMetadata(dataDictionary, eventMappings);

  if (metadata.recordIdField === "") {
    return assembleRecordsTree(metadata, [], options);
  }

  const subjects = await connector.listSubjects(metadata.recordIdField);
  const rows = await fetchAllRows(connector, subjects, {
    mode: options.mode ?? "flat",
    recordIdField: metadata.recordIdField,
    fields: options.fields,
  });

  const result = assembleRecordsTree(metadata, rows, options, subjects);

  console.info("[Records Tree]", {
    subjects: subjects.length,
    rows: rows.length,
    rejected: result.errors.count(),
  });

  return result;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/** Plain-object form with every slot as a sorted array */
export function serializeRecordsTree(tree: RecordsTree): SerializedRecordsTree {
  const out: SerializedRecordsTree = {};

  for (const [event, instruments] of tree) {
    const eventOut: SerializedRecordsTree[string] = {};
    out[event] = eventOut;

    for (const [instrument, subjects] of instruments) {
      const instrumentOut: SerializedRecordsTree[string][string] = {};
      eventOut[instrument] = instrumentOut;

      for (const [subject, instances] of subjects) {
        const subjectOut: Record<string, Record<string, string[]>> = {};
        instrumentOut[subject] = subjectOut;

        for (const [instance, data] of instances) {
          const instanceOut: Record<string, string[]> = {};
          subjectOut[instance] = instanceOut;

          for (const [field, slot] of data) {
            instanceOut[field] = fieldValues(slot);
          }
        }
      }
    }
  }

  return out;
}
