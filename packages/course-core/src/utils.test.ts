import { describe, expect, it } from "vitest";
import { cloneDocument, createChapter, normalizeStudentId, roundTo } from "./utils";

describe("roundTo", () => {
  it("rounds exact ties to the even digit", () => {
    expect(roundTo(6.25, 1)).toBe(6.2);
    expect(roundTo(6.35, 1)).toBe(6.3);
    expect(roundTo(18.75, 1)).toBe(18.8);
    expect(roundTo(-6.25, 1)).toBe(-6.2);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
  });

  it("rounds values that only look like ties by their binary value", () => {
    // 2.675 is stored just below the half
    expect(roundTo(2.675, 2)).toBe(2.67);
    expect(roundTo(33.333333, 1)).toBe(33.3);
  });

  it("leaves non-finite values alone", () => {
    expect(roundTo(Number.NaN, 1)).toBeNaN();
    expect(roundTo(Number.POSITIVE_INFINITY, 1)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("normalizeStudentId", () => {
  it("falls back to the default student for blank ids", () => {
    expect(normalizeStudentId("  Alice ")).toBe("alice");
    expect(normalizeStudentId("   ")).toBe("default_student");
    expect(normalizeStudentId(undefined)).toBe("default_student");
  });
});

describe("cloneDocument", () => {
  it("copies every nested list", () => {
    const original = {
      learningOutcomesOverall: ["Overall"],
      chapters: [createChapter({ chapterId: "ch1", order: 1, learningOutcomes: ["One"] })],
    };
    const copy = cloneDocument(original);
    copy.learningOutcomesOverall.push("Extra");
    copy.chapters[0].learningOutcomes.push("Two");
    copy.chapters[0].prerequisites.push("ch0");

    expect(original.learningOutcomesOverall).toEqual(["Overall"]);
    expect(original.chapters[0].learningOutcomes).toEqual(["One"]);
    expect(original.chapters[0].prerequisites).toEqual([]);
  });
});
