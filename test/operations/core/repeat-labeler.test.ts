import { describe, expect, test } from "vitest";
import { RepeatLabeler } from "../../../src/operations/core/repeat-labeler";

describe("RepeatLabeler", () => {
  test("should keep the first sighting and number later ones from 2", () => {
    const labeler = new RepeatLabeler();

    expect(labeler.label("k__Bacteria;p__Proteo")).toBe("k__Bacteria;p__Proteo");
    expect(labeler.label("k__Bacteria;p__Proteo")).toBe("k__Bacteria;p__Proteo_REPEAT_2;");
    expect(labeler.label("k__Bacteria;p__Proteo")).toBe("k__Bacteria;p__Proteo_REPEAT_3;");
  });

  test("should count each lineage separately", () => {
    const labeler = new RepeatLabeler();

    labeler.label("k__Bacteria");
    labeler.label("k__Archaea");
    expect(labeler.label("k__Archaea")).toBe("k__Archaea_REPEAT_2;");
    expect(labeler.label("k__Bacteria")).toBe("k__Bacteria_REPEAT_2;");

    expect(labeler.repeats).toBe(2);
  });

  test("should key the counter by lineage, not by labeled output", () => {
    const labeler = new RepeatLabeler();

    labeler.label("a");
    expect(labeler.label("a")).toBe("a_REPEAT_2;");
    expect(labeler.label("a_REPEAT_2;")).toBe("a_REPEAT_2;");
  });

  test("should label empty lineages like any other", () => {
    const labeler = new RepeatLabeler();

    expect(labeler.label("")).toBe("");
    expect(labeler.label("")).toBe("_REPEAT_2;");
  });
});
