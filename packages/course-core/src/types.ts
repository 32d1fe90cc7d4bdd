export interface Chapter {
  chapterId: string;
  title: string;
  order: number;
  weekLabel: string;
  learningOutcomes: string[];
  prerequisites: string[];
}

export interface CurriculumDocument {
  unitId?: string;
  unitName?: string;
  description?: string;
  learningOutcomesOverall: string[];
  chapters: Chapter[];
}

export interface Catalog {
  document: CurriculumDocument;
  order: readonly string[];
  chapters: ReadonlyMap<string, Chapter>;
  positions: ReadonlyMap<string, number>;
  aliases: ReadonlyMap<string, string>;
}

export type AliasCollisionPolicy = "reject" | "last-write-wins";

export interface CatalogBuildOptions {
  aliasCollisions?: AliasCollisionPolicy;
}

export interface ChapterSummary {
  chapterId: string;
  title: string;
  order: number;
  weekLabel: string;
  learningOutcomes: string[];
}

export interface OutlineChapter extends ChapterSummary {
  prerequisites: string[];
}

export interface CourseOutline {
  unitId: string | null;
  unitName: string | null;
  description: string | null;
  learningOutcomesOverall: string[];
  chapters: OutlineChapter[];
}

export interface StudentProgress {
  completed: readonly string[];
  notes: readonly string[];
}

export interface ProgressSnapshot {
  studentId: string;
  completedChapters: ChapterSummary[];
  nextChapter: ChapterSummary | null;
  totalChapters: number;
  progressPct: number;
  notes: string[];
}

export type ResultStatus = "success" | "error";
