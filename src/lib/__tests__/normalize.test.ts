import { describe, test, expect } from "vitest";
import { resolveMetadata } from "@/lib/metadata";
import { canonicalInstance, cellText, normalizeRow, splitCheckboxField } from "@/lib/normalize";
import { DICTIONARY, MAPPINGS } from "./fixtures/study";

const metadata = resolveMetadata(DICTIONARY, MAPPINGS);

describe("canonicalInstance", () => {
  test("absent or empty markers are the first instance", () => {
    expect(canonicalInstance(undefined)).toBe("1");
    expect(canonicalInstance(null)).toBe("1");
    expect(canonicalInstance("")).toBe("1");
  });

  test("integers and numeral strings become strings", () => {
    expect(canonicalInstance(1)).toBe("1");
    expect(canonicalInstance(2)).toBe("2");
    expect(canonicalInstance("3")).toBe("3");
  });
});

describe("cellText", () => {
  test("coerces cells to strings", () => {
    expect(cellText(null)).toBe("");
    expect(cellText(undefined)).toBe("");
    expect(cellText(12)).toBe("12");
    expect(cellText("x")).toBe("x");
  });
});

describe("splitCheckboxField", () => {
  test("option of a coded field", () => {
    expect(splitCheckboxField("sym___fever", metadata)).toEqual({ base: "sym", option: "fever" });
  });

  test("base must be a coded field", () => {
    expect(splitCheckboxField("q1___2", metadata)).toBeNull();
    expect(splitCheckboxField("sym", metadata)).toBeNull();
    expect(splitCheckboxField("___2", metadata)).toBeNull();
    expect(splitCheckboxField("sym___", metadata)).toBeNull();
  });
});

describe("normalizeRow: flat", () => {
  test("one tuple per field, identifier and row metadata excluded", () => {
    const { subject, tuples } = normalizeRow(
      {
        record_id: "S1",
        redcap_event_name: "baseline_arm_1",
        redcap_repeat_instrument: "",
        redcap_repeat_instance: "",
        sex: "2",
        demographics_complete: "2",
      },
      "flat",
      metadata
    );

    expect(subject).toBe("S1");
    expect(tuples).toEqual([
      {
        event: "baseline_arm_1",
        instrument: "demographics",
        subject: "S1",
        instance: "1",
        field: "sex",
        value: "2",
      },
      {
        event: "baseline_arm_1",
        instrument: "demographics",
        subject: "S1",
        instance: "1",
        field: "demographics_complete",
        value: "2",
      },
    ]);
  });

  test("checked checkbox option decodes to its base field", () => {
    const { tuples } = normalizeRow(
      { record_id: "S1", redcap_event_name: "baseline_arm_1", sym___fever: "1" },
      "flat",
      metadata
    );

    expect(tuples).toHaveLength(1);
    expect(tuples[0]).toMatchObject({ field: "sym", value: "fever", instrument: "visit" });
  });

  test("unchecked or absent checkbox options are dropped", () => {
    const { tuples } = normalizeRow(
      { record_id: "S1", redcap_event_name: "baseline_arm_1", sym___fever: "0", sym___cough: "" },
      "flat",
      metadata
    );

    expect(tuples).toEqual([]);
  });

  test("empty cells of instruments outside the event are dropped", () => {
    const { tuples } = normalizeRow(
      { record_id: "S1", redcap_event_name: "baseline_arm_1", q1: "", med_name: "" },
      "flat",
      metadata
    );

    expect(tuples.map((t) => t.field)).toEqual(["q1"]);
    expect(tuples[0].value).toBe("");
  });

  test("non-empty cells outside the event are kept for the classifier", () => {
    const { tuples } = normalizeRow(
      { record_id: "S1", redcap_event_name: "baseline_arm_1", med_name: "aspirin" },
      "flat",
      metadata
    );

    expect(tuples).toHaveLength(1);
    expect(tuples[0]).toMatchObject({ field: "med_name", instrument: "meds" });
  });

  test("repeating rows are attributed to the reported instrument", () => {
    const { tuples } = normalizeRow(
      {
        record_id: "S1",
        redcap_event_name: "followup_arm_1",
        redcap_repeat_instrument: "meds",
        redcap_repeat_instance: 2,
        q1: "",
        visit_complete: "",
        med_name: "aspirin",
        meds_complete: "1",
      },
      "flat",
      metadata
    );

    expect(tuples).toEqual([
      {
        event: "followup_arm_1",
        instrument: "meds",
        subject: "S1",
        instance: "2",
        field: "med_name",
        value: "aspirin",
      },
      {
        event: "followup_arm_1",
        instrument: "meds",
        subject: "S1",
        instance: "2",
        field: "meds_complete",
        value: "1",
      },
    ]);
  });

  test("unknown fields have no instrument", () => {
    const { tuples } = normalizeRow(
      { record_id: "S1", redcap_event_name: "baseline_arm_1", legacy_score: "4" },
      "flat",
      metadata
    );

    expect(tuples[0]).toMatchObject({ field: "legacy_score", instrument: null });
  });

  test("row with nothing to keep still reports its subject", () => {
    const { subject, tuples } = normalizeRow(
      { record_id: "S7", redcap_event_name: "baseline_arm_1", med_name: "" },
      "flat",
      metadata
    );

    expect(subject).toBe("S7");
    expect(tuples).toEqual([]);
  });
});

describe("normalizeRow: eav", () => {
  test("one observation per row", () => {
    const { subject, tuples } = normalizeRow(
      { record: "S1", redcap_event_name: "baseline_arm_1", field_name: "sex", value: "2" },
      "eav",
      metadata
    );

    expect(subject).toBe("S1");
    expect(tuples).toEqual([
      {
        event: "baseline_arm_1",
        instrument: "demographics",
        subject: "S1",
        instance: "1",
        field: "sex",
        value: "2",
      },
    ]);
  });

  test("checkbox observations carry the option code as the value", () => {
    const { tuples } = normalizeRow(
      {
        record: "S1",
        redcap_event_name: "followup_arm_1",
        field_name: "sym",
        value: "cough",
        redcap_repeat_instance: "",
      },
      "eav",
      metadata
    );

    expect(tuples[0]).toMatchObject({ field: "sym", value: "cough", instrument: "visit", instance: "1" });
  });

  test("repeat instrument and instance are honoured", () => {
    const { tuples } = normalizeRow(
      {
        record: "S2",
        redcap_event_name: "followup_arm_1",
        redcap_repeat_instrument: "meds",
        redcap_repeat_instance: "3",
        field_name: "med_name",
        value: "ibuprofen",
      },
      "eav",
      metadata
    );

    expect(tuples[0]).toMatchObject({ instrument: "meds", instance: "3", subject: "S2" });
  });
});
