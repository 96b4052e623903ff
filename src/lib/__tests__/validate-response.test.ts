import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { z } from "zod";
import { PayloadValidationError } from "@/lib/errors";
import { validateItems, validatePayload } from "@/lib/validate-response";

const ItemSchema = z.object({ id: z.string() });

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("validateItems", () => {
  test("returns parsed items", () => {
    expect(validateItems(ItemSchema, [{ id: "a" }, { id: "b" }], "items")).toEqual([
      { id: "a" },
      { id: "b" },
    ]);
  });

  test("reports the first failing item by index", () => {
    let error: unknown;
    try {
      validateItems(ItemSchema, [{ id: "a" }, { id: 5 }], "items");
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(PayloadValidationError);
    expect(error).toMatchObject({
      label: "items",
      issues: [{ path: "1.id", message: "Expected string, received number" }],
    });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  test("payload must be an array", () => {
    expect(() => validateItems(ItemSchema, { error: "Invalid token" }, "items")).toThrow(
      PayloadValidationError
    );
  });
});

describe("validatePayload", () => {
  test("returns the parsed value or throws", () => {
    expect(validatePayload(ItemSchema, { id: "a" }, "item")).toEqual({ id: "a" });
    expect(() => validatePayload(ItemSchema, {}, "item")).toThrow("item failed validation");
  });
});
