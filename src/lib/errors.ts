import { ZodError } from "zod";

export interface ZodIssueSummary {
  path: string;
  message: string;
}

/**
 * Non-200 response from the study API
 */
export class StudyApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`HTTP ${status} - ${body}`);
    this.name = "StudyApiError";
    this.status = status;
    this.body = body;
  }

  /** 502/503/504 are worth retrying as-is */
  get retryable(): boolean {
    return this.status === 502 || this.status === 503 || this.status === 504;
  }
}

/**
 * The service refused a records export for the requested batch of
 * subjects. It answers oversized exports with a 400 or a 500.
 */
export class BatchTooLargeError extends StudyApiError {
  constructor(status: number, body: string) {
    super(status, body);
    this.name = "BatchTooLargeError";
  }

  static matches(status: number): boolean {
    return status === 400 || status === 500;
  }
}

/**
 * A single-subject export was still refused as too large.
 */
export class BatchSizeExhaustedError extends Error {
  readonly subject: string;

  constructor(subject: string, cause: BatchTooLargeError) {
    super(`Export refused for single subject ${subject}: ${cause.message}`, { cause });
    this.name = "BatchSizeExhaustedError";
    this.subject = subject;
  }
}

/**
 * A connector payload did not match its schema
 */
export class PayloadValidationError extends Error {
  readonly label: string;
  readonly issues: ZodIssueSummary[];

  constructor(label: string, issues: ZodIssueSummary[]) {
    super(`${label} failed validation: ${JSON.stringify(issues.slice(0, 5))}`);
    this.name = "PayloadValidationError";
    this.label = label;
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  readonly issues: ZodIssueSummary[];

  constructor(issues: ZodIssueSummary[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Flatten Zod issues to path/message pairs
 */
export function formatZodIssues(error: ZodError): ZodIssueSummary[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Render any thrown value for script output
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return `Validation error: ${JSON.stringify(formatZodIssues(error))}`;
  }

  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
