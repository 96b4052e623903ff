import type { RecordsRequest, StudyConnector } from "@/lib/connector";
import { BatchTooLargeError } from "@/lib/errors";
import type { FieldDefinition, InstrumentEventMapping, RecordRow } from "@/types/study";

export function def(
  fieldName: string,
  formName: string,
  fieldType: string,
  choices = ""
): FieldDefinition {
  return {
    field_name: fieldName,
    form_name: formName,
    field_type: fieldType,
    select_choices_or_calculations: choices,
  };
}

export function mapping(event: string, form: string): InstrumentEventMapping {
  return { unique_event_name: event, form };
}

/**
 * Two events, three instruments:
 *   baseline_arm_1: demographics, visit
 *   followup_arm_1: visit, meds (meds repeats)
 */
export const DICTIONARY: FieldDefinition[] = [
  def("record_id", "demographics", "text"),
  def("sex", "demographics", "radio", "1, Male | 2, Female"),
  def("smoker", "demographics", "yesno"),
  def("q1", "visit", "text"),
  def("sym", "visit", "checkbox", "fever, Fever | cough, Cough"),
  def("med_name", "meds", "text"),
];

export const MAPPINGS: InstrumentEventMapping[] = [
  mapping("baseline_arm_1", "demographics"),
  mapping("baseline_arm_1", "visit"),
  mapping("followup_arm_1", "visit"),
  mapping("followup_arm_1", "meds"),
];

export interface FakeStudyOptions {
  dictionary?: FieldDefinition[];
  mappings?: InstrumentEventMapping[];
  rows?: RecordRow[];
  /** Overrides the subjects derived from the rows */
  subjects?: string[];
  /** Batches larger than this are refused as too large */
  maxBatch?: number;
  /** Subjects whose data only exports one subject at a time */
  heavySubjects?: string[];
  /** Thrown by every records request */
  failWith?: Error;
}

/**
 * In-memory study. Rows are served by subject; every records request is
 * logged, refused ones included.
 */
export class FakeStudyConnector implements StudyConnector {
  readonly requests: RecordsRequest[] = [];
  private readonly dictionary: FieldDefinition[];
  private readonly mappings: InstrumentEventMapping[];
  private readonly rows: RecordRow[];
  private readonly options: FakeStudyOptions;

  constructor(options: FakeStudyOptions = {}) {
    this.dictionary = options.dictionary ?? DICTIONARY;
    this.mappings = options.mappings ?? MAPPINGS;
    this.rows = options.rows ?? [];
    this.options = options;
  }

  async getDataDictionary(): Promise<FieldDefinition[]> {
    return this.dictionary;
  }

  async getInstrumentEventMappings(): Promise<InstrumentEventMapping[]> {
    return this.mappings;
  }

  async getRecords(request: RecordsRequest): Promise<RecordRow[]> {
    this.requests.push(request);

    if (this.options.failWith) throw this.options.failWith;
    if (this.options.maxBatch !== undefined && request.subjects.length > this.options.maxBatch) {
      throw new BatchTooLargeError(400, "Request too large");
    }
    const heavy = this.options.heavySubjects ?? [];
    if (request.subjects.length > 1 && request.subjects.some((s) => heavy.includes(s))) {
      throw new BatchTooLargeError(500, "Request too large");
    }

    const wanted = new Set(request.subjects);
    return this.rows.filter((row) => wanted.has(this.subjectOf(row, request.type === "eav")));
  }

  async listSubjects(recordIdField: string): Promise<string[]> {
    if (this.options.subjects) return this.options.subjects;

    const subjects = new Set<string>();
    for (const row of this.rows) {
      const id = row[recordIdField] ?? row.record;
      if (typeof id === "string") subjects.add(id);
    }
    return [...subjects];
  }

  private subjectOf(row: RecordRow, eav: boolean): string {
    const id = eav ? row.record : row[this.dictionary[0]?.field_name ?? ""];
    return id === undefined || id === null ? "" : String(id);
  }
}
