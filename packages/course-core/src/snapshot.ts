import { summarizeChapter, summarizeChapters, sortByCatalogOrder } from "./catalog";
import type { Catalog, ChapterSummary, ProgressSnapshot, StudentProgress } from "./types";
import { roundTo } from "./utils";

export const computeProgressPct = (
  completedCount: number,
  totalChapters: number
): number =>
  totalChapters === 0 ? 0 : roundTo((completedCount / totalChapters) * 100, 1);

export const findNextChapterId = (
  catalog: Catalog,
  completed: ReadonlySet<string>
): string | null => catalog.order.find((chapterId) => !completed.has(chapterId)) ?? null;

export const buildProgressSnapshot = (
  catalog: Catalog,
  studentId: string,
  progress: StudentProgress | undefined
): ProgressSnapshot => {
  const completedIds = sortByCatalogOrder(catalog, progress?.completed ?? []);
  const nextChapterId = findNextChapterId(catalog, new Set(completedIds));
  const nextChapter: ChapterSummary | null =
    nextChapterId === null ? null : summarizeChapter(catalog, nextChapterId) ?? null;

  return {
    studentId,
    completedChapters: summarizeChapters(catalog, completedIds),
    nextChapter,
    totalChapters: catalog.order.length,
    progressPct: computeProgressPct(completedIds.length, catalog.order.length),
    notes: [...(progress?.notes ?? [])],
  };
};
