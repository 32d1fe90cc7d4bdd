import Papa from "papaparse";
import { z } from "zod";
import { CSV_LIST_SEPARATOR } from "./constants";
import { ConfigError, describeError } from "./errors";
import type { CurriculumDocument } from "./types";

const ChapterRecordSchema = z.object({
  chapter_id: z.string().trim().min(1, "chapter_id is required"),
  order: z.number().int(),
  title: z.string().nullish(),
  week_label: z.string().nullish(),
  learning_outcomes: z.array(z.string()).nullish(),
  prerequisites: z.array(z.string()).nullish(),
});

export const CurriculumDocumentSchema = z.object({
  unit_id: z.string().nullish(),
  unit_name: z.string().nullish(),
  description: z.string().nullish(),
  learning_outcomes_overall: z.array(z.string()).nullish(),
  chapters: z.array(ChapterRecordSchema),
});

export type CurriculumRecord = z.input<typeof CurriculumDocumentSchema>;

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;

export const parseCurriculumDocument = (raw: unknown): CurriculumDocument => {
  const parsed = CurriculumDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ConfigError(`Curriculum document is invalid: ${issues.join("; ")}`, {
      issues,
    });
  }

  const record = parsed.data;
  return {
    unitId: record.unit_id ?? undefined,
    unitName: record.unit_name ?? undefined,
    description: record.description ?? undefined,
    learningOutcomesOverall: record.learning_outcomes_overall ?? [],
    chapters: record.chapters.map((chapter) => ({
      chapterId: chapter.chapter_id,
      title: chapter.title ?? "",
      order: chapter.order,
      weekLabel: chapter.week_label ?? "",
      learningOutcomes: chapter.learning_outcomes ?? [],
      prerequisites: chapter.prerequisites ?? [],
    })),
  };
};

export const parseCurriculumJson = (text: string): CurriculumDocument => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Curriculum document is not valid JSON: ${describeError(error)}`,
      { cause: error }
    );
  }
  return parseCurriculumDocument(raw);
};

const splitList = (cell: string | undefined): string[] =>
  (cell ?? "")
    .split(CSV_LIST_SEPARATOR)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const toOrder = (cell: string | undefined): number | undefined =>
  cell === undefined || cell.trim() === "" ? undefined : Number(cell);

const blankToUndefined = (cell: string | undefined): string | undefined => {
  const value = cell?.trim();
  return value ? value : undefined;
};

// Header row: chapter_id,order,title,week_label,learning_outcomes,prerequisites
// List cells are separated with "|".
export const parseCurriculumCsv = (text: string): CurriculumDocument => {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  if (parsed.errors.length > 0) {
    const issues = parsed.errors.map(
      (error) => `row ${error.row ?? "?"}: ${error.message}`
    );
    throw new ConfigError(`Curriculum CSV could not be parsed: ${issues.join("; ")}`, {
      issues,
    });
  }

  return parseCurriculumDocument({
    chapters: parsed.data.map((row) => ({
      chapter_id: row.chapter_id ?? "",
      order: toOrder(row.order),
      title: blankToUndefined(row.title),
      week_label: blankToUndefined(row.week_label),
      learning_outcomes: splitList(row.learning_outcomes),
      prerequisites: splitList(row.prerequisites),
    })),
  });
};
