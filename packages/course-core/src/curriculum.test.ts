import { describe, expect, it } from "vitest";
import { parseCurriculumCsv, parseCurriculumDocument, parseCurriculumJson } from "./curriculum";
import { ConfigError } from "./errors";

describe("parseCurriculumDocument", () => {
  it("maps snake_case records onto chapters with defaults", () => {
    const document = parseCurriculumDocument({
      unit_id: "U1",
      chapters: [{ chapter_id: " ch1 ", order: 1 }],
    });
    expect(document).toEqual({
      unitId: "U1",
      unitName: undefined,
      description: undefined,
      learningOutcomesOverall: [],
      chapters: [
        {
          chapterId: "ch1",
          title: "",
          order: 1,
          weekLabel: "",
          learningOutcomes: [],
          prerequisites: [],
        },
      ],
    });
  });

  it("reports a chapter without an id", () => {
    expect(() => parseCurriculumDocument({ chapters: [{ order: 1, title: "Intro" }] })).toThrow(
      "Curriculum document is invalid: chapters.0.chapter_id: Required"
    );
  });

  it("keeps one issue line per failed check", () => {
    try {
      parseCurriculumDocument({ chapters: [{ title: "Intro" }] });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.issues : []).toEqual([
        "chapters.0.chapter_id: Required",
        "chapters.0.order: Required",
      ]);
      return;
    }
    throw new Error("expected parseCurriculumDocument to throw");
  });

  it("rejects a blank id and a fractional order", () => {
    expect(() => parseCurriculumDocument({ chapters: [{ chapter_id: "  ", order: 1 }] })).toThrow(
      "chapters.0.chapter_id: chapter_id is required"
    );
    expect(() => parseCurriculumDocument({ chapters: [{ chapter_id: "a", order: 1.5 }] })).toThrow(
      ConfigError
    );
  });

  it("rejects a document without a chapter list", () => {
    expect(() => parseCurriculumDocument({ unit_id: "U1" })).toThrow(ConfigError);
  });
});

describe("parseCurriculumJson", () => {
  it("wraps syntax errors in a ConfigError", () => {
    expect(() => parseCurriculumJson("{ chapters: ")).toThrow(/not valid JSON/);
  });
});

describe("parseCurriculumCsv", () => {
  it("reads chapters with pipe-separated lists", () => {
    const csv = [
      "chapter_id,order,title,week_label,learning_outcomes,prerequisites",
      'ch2,2,"Loops, part 1",Week 2,Write a for loop|Write a while loop,ch1',
      "ch1,1,Intro,Week 1,,",
      "",
    ].join("\n");

    const document = parseCurriculumCsv(csv);
    expect(document.chapters).toEqual([
      {
        chapterId: "ch2",
        title: "Loops, part 1",
        order: 2,
        weekLabel: "Week 2",
        learningOutcomes: ["Write a for loop", "Write a while loop"],
        prerequisites: ["ch1"],
      },
      {
        chapterId: "ch1",
        title: "Intro",
        order: 1,
        weekLabel: "Week 1",
        learningOutcomes: [],
        prerequisites: [],
      },
    ]);
  });

  it("rejects a row with a missing order", () => {
    expect(() => parseCurriculumCsv("chapter_id,order\nch1,\n")).toThrow(
      /chapters\.0\.order: Required/
    );
  });
});
