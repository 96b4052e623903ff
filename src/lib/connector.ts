/**
 * Study Connector
 *
 * The read side of the study API that the records-tree build consumes.
 * `HttpStudyConnector` talks to the service's form-encoded POST endpoint;
 * tests substitute their own in-memory implementation of the interface.
 *
 * Usage:
 *   const connector = HttpStudyConnector.fromConfig(loadConfig());
 *   const { tree, errors } = await buildRecordsTree(connector);
 */

import { z } from "zod";
import type { StudyConfig } from "./config";
import { BatchTooLargeError, StudyApiError } from "./errors";
import { withRetry } from "./retry";
import { validateItems } from "./validate-response";
import {
  type FieldDefinition,
  FieldDefinitionSchema,
  type InstrumentEventMapping,
  InstrumentEventMappingSchema,
  type RecordRow,
  RecordRowSchema,
  type RecordsMode,
} from "../types/study";

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface RecordsRequest {
  type: RecordsMode;
  subjects: readonly string[];
  /** Restrict the export to these fields */
  fields?: readonly string[];
}

export interface StudyConnector {
  /** Data dictionary, in declaration order */
  getDataDictionary(): Promise<FieldDefinition[]>;
  getInstrumentEventMappings(): Promise<InstrumentEventMapping[]>;
  /**
   * Raw-coded rows for exactly the given subjects.
   * Throws BatchTooLargeError when the service refuses the batch size.
   */
  getRecords(request: RecordsRequest): Promise<RecordRow[]>;
  /** Distinct subject ids, first-seen order */
  listSubjects(recordIdField: string): Promise<string[]>;
}

// ---------------------------------------------------------------------------
// HTTP implementation
// ---------------------------------------------------------------------------

export interface HttpStudyConnectorOptions {
  url: string;
  token: string;
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type FormParams = Record<string, string | undefined>;

const SubjectRowSchema = z.record(z.string(), z.union([z.string(), z.number(), z.null()]));

/** Indexed array parameters: records[0]=a&records[1]=b */
export function indexedParams(name: string, values: readonly string[]): FormParams {
  const params: FormParams = {};
  values.forEach((value, i) => {
    params[`${name}[${i}]`] = value;
  });
  return params;
}

export class HttpStudyConnector implements StudyConnector {
  private readonly url: string;
  private readonly token: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpStudyConnectorOptions) {
    this.url = options.url;
    this.token = options.token;
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  static fromConfig(config: StudyConfig): HttpStudyConnector {
    return new HttpStudyConnector({
      url: config.apiUrl,
      token: config.apiToken,
      retries: config.retries,
      retryDelayMs: config.retryDelayMs,
      timeoutMs: config.timeoutMs,
    });
  }

  async getDataDictionary(): Promise<FieldDefinition[]> {
    const data = await this.postJson("metadata");
    return validateItems(FieldDefinitionSchema, data, "data dictionary");
  }

  async getInstrumentEventMappings(): Promise<InstrumentEventMapping[]> {
    const data = await this.postJson("formEventMapping");
    return validateItems(InstrumentEventMappingSchema, data, "instrument-event mappings");
  }

  async getRecords(request: RecordsRequest): Promise<RecordRow[]> {
    const params: FormParams = {
      type: request.type,
      rawOrLabel: "raw",
      rawOrLabelHeaders: "raw",
      exportCheckboxLabel: "false",
      exportSurveyFields: "true",
      exportDataAccessGroups: "true",
      ...indexedParams("records", request.subjects),
      ...indexedParams("fields", request.fields ?? []),
    };

    try {
      const data = await this.postJson("record", params);
      return validateItems(RecordRowSchema, data, "records");
    } catch (error) {
      if (error instanceof StudyApiError && BatchTooLargeError.matches(error.status)) {
        throw new BatchTooLargeError(error.status, error.body);
      }
      throw error;
    }
  }

  async listSubjects(recordIdField: string): Promise<string[]> {
    const data = await this.postJson("record", {
      type: "flat",
      rawOrLabel: "raw",
      rawOrLabelHeaders: "raw",
      ...indexedParams("fields", [recordIdField]),
    });
    const rows = validateItems(SubjectRowSchema, data, "subject ids");

    const subjects = new Set<string>();
    for (const row of rows) {
      const id = row[recordIdField];
      if (id !== undefined && id !== null && id !== "") {
        subjects.add(String(id));
      }
    }
    return [...subjects];
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async postJson(content: string, params: FormParams = {}): Promise<unknown> {
    const response = await this.post(content, params);
    return response.json();
  }

  private post(content: string, params: FormParams): Promise<Response> {
    const body = new URLSearchParams();
    const all: FormParams = {
      token: this.token,
      content,
      format: "json",
      returnFormat: "json",
      ...params,
    };
    for (const [key, value] of Object.entries(all)) {
      if (value !== undefined) body.append(key, value);
    }

    return withRetry(
      async () => {
        const response = await this.fetchImpl(this.url, {
          method: "POST",
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (response.status !== 200) {
          throw new StudyApiError(response.status, await response.text());
        }
        return response;
      },
      {
        retries: this.retries,
        delayMs: this.retryDelayMs,
        shouldRetry: (error) => error instanceof StudyApiError && error.retryable,
      }
    );
  }
}
