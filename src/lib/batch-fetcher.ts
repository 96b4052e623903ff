/**
 * Adaptive batch retrieval of exported rows.
 *
 * The service refuses exports it considers too large, and where that limit
 * sits depends on the data. We start by asking for every subject at once
 * and halve the batch each time a request is refused, keeping the smaller
 * size once something gets through. Requests run one at a time: the
 * shrink only makes sense after observing a refusal.
 */

import type { StudyConnector } from "./connector";
import { BatchSizeExhaustedError, BatchTooLargeError } from "./errors";
import { EAV_FIELD_COLUMN, type RecordRow, type RecordsMode } from "../types/study";

export interface FetchRowsOptions {
  mode: RecordsMode;
  /** Identifier field; its own EAV rows are dropped */
  recordIdField: string;
  fields?: readonly string[];
}

/** Batch size after a refusal: half the current size, rounded up */
export function nextBatchSize(batchSize: number): number {
  return Math.max(1, Math.ceil(batchSize / 2));
}

/**
 * Fetch every row for `subjects`, each subject exactly once.
 * Any failure other than a size refusal aborts the whole retrieval.
 */
export async function fetchAllRows(
  connector: StudyConnector,
  subjects: readonly string[],
  options: FetchRowsOptions
): Promise<RecordRow[]> {
  const { mode, recordIdField, fields } = options;

  console.info(`[Batch Fetch] Found ${subjects.length} subjects.`);

  const rows: RecordRow[] = [];
  let offset = 0;
  let batchSize = subjects.length;

  while (offset < subjects.length) {
    const batch = subjects.slice(offset, offset + batchSize);
    console.info(`[Batch Fetch] Requesting ${batch.length} subjects...`);

    try {
      const batchRows = await connector.getRecords({ type: mode, subjects: batch, fields });
      for (const row of batchRows) rows.push(row);
      offset += batch.length;
    } catch (error) {
      if (!(error instanceof BatchTooLargeError)) throw error;
      if (batch.length === 1) {
        throw new BatchSizeExhaustedError(batch[0], error);
      }

      batchSize = nextBatchSize(batchSize);
      console.info(`[Batch Fetch] Reducing batch size to ${batchSize} and trying again...`);
    }
  }

  if (mode === "eav") {
    return rows.filter((row) => row[EAV_FIELD_COLUMN] !== recordIdField);
  }
  return rows;
}
