import { fileURLToPath } from "node:url";
import {
  ConfigError,
  cloneDocument,
  createChapter,
  type CurriculumDocument,
} from "@coursetrack/course-core";
import { describe, expect, it, vi } from "vitest";
import { introLoopsDocument } from "../__fixtures__/documents";
import { DEFAULT_CURRICULUM_PATH } from "../config";
import { CourseCatalog, documentCurriculumSource, fileCurriculumSource } from "./courseCatalog";

const csvPath = fileURLToPath(new URL("../__fixtures__/two-chapters.csv", import.meta.url));

describe("CourseCatalog", () => {
  it("loads the bundled curriculum", async () => {
    const catalog = new CourseCatalog(fileCurriculumSource(DEFAULT_CURRICULUM_PATH));
    expect(await catalog.order()).toEqual([
      "ch01",
      "ch02",
      "ch03",
      "ch04",
      "ch05",
      "ch06",
      "ch07",
      "ch08",
    ]);
    expect(await catalog.resolve("week 3")).toBe("ch03");
    expect(await catalog.resolve("Chapter 8")).toBe("ch08");
    expect(await catalog.resolve("testing and debugging")).toBe("ch06");
    expect((await catalog.outline()).unitId).toBe("PRG101");
  });

  it("loads a CSV curriculum", async () => {
    const catalog = new CourseCatalog(fileCurriculumSource(csvPath));
    expect(await catalog.order()).toEqual(["ch1", "ch2"]);
    expect(await catalog.summary("ch1")).toEqual({
      chapterId: "ch1",
      title: "Intro",
      order: 1,
      weekLabel: "Week 1",
      learningOutcomes: ["Say hello", "Run a program"],
    });
  });

  it("fails with a ConfigError when the document is missing", async () => {
    const missing = "/nonexistent/course.json";
    const catalog = new CourseCatalog(fileCurriculumSource(missing));
    await expect(catalog.load()).rejects.toThrow(
      `Curriculum document could not be read from ${missing}`
    );
    await expect(catalog.load()).rejects.toBeInstanceOf(ConfigError);
  });

  it("reads the source once for concurrent first accesses", async () => {
    const source = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return introLoopsDocument;
    });
    const catalog = new CourseCatalog(source);

    const [first, second, resolved] = await Promise.all([
      catalog.load(),
      catalog.load(),
      catalog.resolve("loops"),
    ]);

    expect(source).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(resolved).toBe("ch2");
    expect(await catalog.load()).toBe(first);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it("publishes nothing on failure and retries on the next access", async () => {
    const source = vi
      .fn<[], Promise<CurriculumDocument>>()
      .mockRejectedValueOnce(new Error("disk unavailable"))
      .mockResolvedValueOnce(introLoopsDocument);
    const catalog = new CourseCatalog(source);

    await expect(catalog.load()).rejects.toThrow(
      "Curriculum could not be loaded: disk unavailable"
    );
    expect(catalog.isLoaded).toBe(false);

    expect(await catalog.order()).toEqual(["ch1", "ch2"]);
    expect(catalog.isLoaded).toBe(true);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it("applies the configured alias collision policy", async () => {
    const document: CurriculumDocument = {
      learningOutcomesOverall: [],
      chapters: [
        createChapter({ chapterId: "a", order: 1, weekLabel: "Week 1" }),
        createChapter({ chapterId: "b", order: 2, weekLabel: "Week 1" }),
      ],
    };

    const strict = new CourseCatalog(documentCurriculumSource(document));
    await expect(strict.load()).rejects.toThrow('Alias "week 1" is claimed by both "a" and "b"');

    const lenient = new CourseCatalog(documentCurriculumSource(document), {
      aliasCollisions: "last-write-wins",
    });
    expect(await lenient.resolve("Week 1")).toBe("b");
  });

  it("is unaffected by later edits to the source document", async () => {
    const document = cloneDocument(introLoopsDocument);
    document.chapters[0].learningOutcomes.push("Print a greeting");
    const catalog = new CourseCatalog(documentCurriculumSource(document));
    await catalog.load();

    document.unitName = "Changed";
    document.chapters[0].learningOutcomes.push("Injected");
    document.chapters[0].title = "Renamed";

    expect((await catalog.summary("ch1"))?.learningOutcomes).toEqual(["Print a greeting"]);
    expect(await catalog.resolve("Intro")).toBe("ch1");
    expect(await catalog.resolve("Renamed")).toBeUndefined();
    expect((await catalog.outline()).unitName).toBe("Test Unit");
  });

  it("returns undefined for unknown chapters", async () => {
    const catalog = new CourseCatalog(documentCurriculumSource(introLoopsDocument));
    expect(await catalog.summary("ch9")).toBeUndefined();
    expect(await catalog.resolve("recursion")).toBeUndefined();
  });
});
