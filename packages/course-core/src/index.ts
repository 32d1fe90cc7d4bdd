export * from "./types";
export * from "./constants";
export { CourseError, ConfigError, describeError } from "./errors";
export {
  buildCatalog,
  resolveChapter,
  chapterOrder,
  summarizeChapter,
  summarizeChapters,
  sortByCatalogOrder,
  buildCourseOutline,
} from "./catalog";
export {
  CurriculumDocumentSchema,
  parseCurriculumDocument,
  parseCurriculumJson,
  parseCurriculumCsv,
} from "./curriculum";
export type { CurriculumRecord } from "./curriculum";
export {
  buildProgressSnapshot,
  computeProgressPct,
  findNextChapterId,
} from "./snapshot";
export {
  cloneChapter,
  cloneDocument,
  createChapter,
  normalizeLabel,
  normalizeStudentId,
  ordinalAlias,
  roundTo,
} from "./utils";
