import { z } from "zod";
import { PayloadValidationError, formatZodIssues } from "./errors";

/**
 * Validate a single connector payload against a Zod schema.
 * Failures are logged and raised: a payload we cannot read means the
 * build cannot be trusted.
 *
 * @param label - Payload name used in logs and the raised error
 */
export function validatePayload<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  label: string
): z.infer<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = formatZodIssues(result.error);

    console.error("[Payload Validation Failed]", {
      label,
      errors: issues,
      data: JSON.stringify(data).slice(0, 1000), // Truncate for logs
    });

    throw new PayloadValidationError(label, issues);
  }

  return result.data;
}

/**
 * Validate an array of items against a schema.
 * Every failing item is collected before raising, so the log shows how
 * much of the payload is off.
 */
export function validateItems<T extends z.ZodTypeAny>(
  schema: T,
  items: unknown,
  label: string
): z.infer<T>[] {
  if (!Array.isArray(items)) {
    throw new PayloadValidationError(label, [
      { path: "", message: `Expected an array, received ${typeof items}` },
    ]);
  }

  const validated: z.infer<T>[] = [];
  const errors: Array<{ index: number; issues: z.ZodIssue[] }> = [];

  for (let i = 0; i < items.length; i++) {
    const result = schema.safeParse(items[i]);
    if (result.success) {
      validated.push(result.data);
    } else {
      errors.push({ index: i, issues: result.error.issues });
    }
  }

  if (errors.length > 0) {
    const first = errors[0];

    console.error("[Item Validation Errors]", {
      label,
      failedCount: errors.length,
      totalCount: items.length,
      firstError: first,
      sampleItem: JSON.stringify(items[first.index]).slice(0, 500),
    });

    throw new PayloadValidationError(
      label,
      first.issues.map((issue) => ({
        path: [first.index, ...issue.path].join("."),
        message: issue.message,
      }))
    );
  }

  return validated;
}
