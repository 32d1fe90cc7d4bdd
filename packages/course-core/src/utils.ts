import { DEFAULT_STUDENT_ID, ORDINAL_ALIAS_PREFIX } from "./constants";
import type { Chapter, CurriculumDocument } from "./types";

export const normalizeLabel = (label: string | null | undefined): string =>
  (label ?? "").trim().toLowerCase();

export const normalizeStudentId = (studentId: string | null | undefined): string =>
  normalizeLabel(studentId) || DEFAULT_STUDENT_ID;

export const ordinalAlias = (order: number): string => `${ORDINAL_ALIAS_PREFIX} ${order}`;

// toFixed rounds exact ties away from zero; a tie is when the exact binary
// value stops one digit past `digits` on a 5.
const EXACT_DIGITS = 100;

/**
 * Rounds to `digits` decimals, sending exact ties to the even digit
 * (6.25 -> 6.2, 18.75 -> 18.8).
 */
export const roundTo = (value: number, digits: number): number => {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }
  const rounded = Number(value.toFixed(digits));
  const [whole = "0", fraction = ""] = value
    .toFixed(EXACT_DIGITS)
    .replace(/0+$/, "")
    .split(".");
  if (fraction.length !== digits + 1 || !fraction.endsWith("5")) {
    return rounded;
  }
  const kept = fraction.slice(0, digits);
  const lastDigit = Number((digits > 0 ? kept : whole).slice(-1));
  if (lastDigit % 2 === 1) {
    return rounded;
  }
  return Number(digits > 0 ? `${whole}.${kept}` : whole);
};

export const createChapter = (
  fields: Partial<Chapter> & Pick<Chapter, "chapterId" | "order">
): Chapter => ({
  title: "",
  weekLabel: "",
  learningOutcomes: [],
  prerequisites: [],
  ...fields,
});

export const cloneChapter = (chapter: Chapter): Chapter => ({
  ...chapter,
  learningOutcomes: [...chapter.learningOutcomes],
  prerequisites: [...chapter.prerequisites],
});

export const cloneDocument = (document: CurriculumDocument): CurriculumDocument => ({
  ...document,
  learningOutcomesOverall: [...document.learningOutcomesOverall],
  chapters: document.chapters.map(cloneChapter),
});
