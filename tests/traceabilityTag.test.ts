import { describe, it, expect } from "vitest";
import {
  buildTraceabilityTag,
  extractHeightId,
  toHeightId,
} from "../src/utils/traceabilityTag";

describe("traceability tag", () => {
  it("builds the Height ID from the task index", () => {
    expect(toHeightId(423)).toBe("T-423");
  });

  it("uses a stable tag format", () => {
    expect(buildTraceabilityTag("T-423")).toBe("[Imported from Height: T-423]");
  });

  it("extracts the Height ID from a description", () => {
    expect(
      extractHeightId("[Imported from Height: T-7]\n\nSome details")
    ).toBe("T-7");
  });

  it("accepts brackets escaped by Linear's markdown", () => {
    expect(extractHeightId("\\[Imported from Height: T-42\\]\n\nBody")).toBe(
      "T-42"
    );
  });

  it("reads back what it writes", () => {
    expect(extractHeightId(buildTraceabilityTag(toHeightId(9)))).toBe("T-9");
  });

  it("returns undefined when no tag is present", () => {
    expect(extractHeightId("Created directly in Linear")).toBeUndefined();
    expect(extractHeightId("[Imported from Jira: ABC-1]")).toBeUndefined();
    expect(extractHeightId(null)).toBeUndefined();
    expect(extractHeightId(undefined)).toBeUndefined();
  });
});
