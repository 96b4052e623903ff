/**
 * Tuple admission. Remote metadata and remote data drift apart, so a tuple
 * that no longer fits the metadata is filed in the error report under the
 * first check it fails and left out of the tree. None of this stops a
 * build.
 */

import {
  DATA_ACCESS_GROUP_FIELD,
  ERROR_CATEGORIES,
  type AdmissibleTuple,
  type CandidateTuple,
  type ChoiceMap,
  type ErrorCategory,
  type RejectedTuple,
  type StudyMetadata,
} from "../types/study";

// ---------------------------------------------------------------------------
// Error report
// ---------------------------------------------------------------------------

export class ErrorReport {
  private readonly entries = new Map<ErrorCategory, RejectedTuple[]>();

  record(category: ErrorCategory, tuple: CandidateTuple): void {
    const rejected: RejectedTuple = {
      event: tuple.event,
      subject: tuple.subject,
      field: tuple.field,
      value: tuple.value,
      instrument: tuple.instrument,
    };

    const list = this.entries.get(category);
    if (list) {
      list.push(rejected);
    } else {
      this.entries.set(category, [rejected]);
    }
  }

  get(category: ErrorCategory): readonly RejectedTuple[] {
    return this.entries.get(category) ?? [];
  }

  /** Categories with at least one entry, in check order */
  get categories(): ErrorCategory[] {
    return ERROR_CATEGORIES.filter((category) => this.entries.has(category));
  }

  count(category?: ErrorCategory): number {
    if (category) return this.get(category).length;
    let total = 0;
    for (const list of this.entries.values()) total += list.length;
    return total;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  toJSON(): Partial<Record<ErrorCategory, RejectedTuple[]>> {
    const out: Partial<Record<ErrorCategory, RejectedTuple[]>> = {};
    for (const category of this.categories) {
      out[category] = [...this.get(category)];
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

export interface ClassifyOptions {
  /** Keep raw codes: skip choice decoding and its checks */
  rawSelectors?: boolean;
}

function isLabel(choices: ChoiceMap, value: string): boolean {
  for (const label of choices.values()) {
    if (label === value) return true;
  }
  return false;
}

/**
 * Admit a tuple, decoding coded values, or record why it was rejected.
 * A value that matches a label instead of a code is not repaired: its
 * category flags the drift for review.
 */
export function classifyTuple(
  tuple: CandidateTuple,
  metadata: StudyMetadata,
  errors: ErrorReport,
  options: ClassifyOptions = {}
): AdmissibleTuple | null {
  const { event, field, value, instrument } = tuple;
  let decoded = value;

  if (!options.rawSelectors && value !== "") {
    const choices = metadata.selectorMap.get(field);
    if (choices) {
      const label = choices.get(value);
      if (label === undefined) {
        errors.record(isLabel(choices, value) ? "choice value as text" : "choice value is missing", tuple);
        return null;
      }
      decoded = label;
    }
  }

  const eventInstruments = metadata.eventInstruments.get(event);
  if (!eventInstruments) {
    errors.record("event is missing", tuple);
    return null;
  }

  if (field !== DATA_ACCESS_GROUP_FIELD && !metadata.fieldInstruments.has(field)) {
    errors.record("field not in a form", tuple);
    return null;
  }

  if (instrument === null || !eventInstruments.has(instrument)) {
    errors.record("form not in given event", tuple);
    return null;
  }

  return { ...tuple, instrument, decoded };
}
