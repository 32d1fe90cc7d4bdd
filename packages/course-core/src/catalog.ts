import { DEFAULT_ALIAS_COLLISION_POLICY } from "./constants";
import { ConfigError } from "./errors";
import type {
  Catalog,
  CatalogBuildOptions,
  Chapter,
  ChapterSummary,
  CourseOutline,
  CurriculumDocument,
} from "./types";
import { cloneChapter, cloneDocument, normalizeLabel, ordinalAlias } from "./utils";

const freezeChapter = (chapter: Chapter): Chapter => {
  Object.freeze(chapter.learningOutcomes);
  Object.freeze(chapter.prerequisites);
  return Object.freeze(chapter);
};

const chapterAliases = (chapter: Chapter): Set<string> => {
  const aliases = new Set<string>([
    chapter.chapterId,
    normalizeLabel(chapter.title),
    normalizeLabel(chapter.weekLabel),
    ordinalAlias(chapter.order),
  ]);
  aliases.delete("");
  return aliases;
};

export const buildCatalog = (
  document: CurriculumDocument,
  options: CatalogBuildOptions = {}
): Catalog => {
  const policy = options.aliasCollisions ?? DEFAULT_ALIAS_COLLISION_POLICY;
  const owned = cloneDocument(document);
  const sorted = [...owned.chapters].sort((a, b) => a.order - b.order);
  const canonical: Chapter[] = [];
  const chapters = new Map<string, Chapter>();
  const positions = new Map<string, number>();
  const ordersSeen = new Map<number, string>();

  for (const chapter of sorted) {
    const chapterId = normalizeLabel(chapter.chapterId);
    if (!chapterId) {
      throw new ConfigError(`Chapter with order ${chapter.order} has no chapter_id`);
    }
    if (chapters.has(chapterId)) {
      throw new ConfigError(`Duplicate chapter_id "${chapterId}"`);
    }
    const orderOwner = ordersSeen.get(chapter.order);
    if (orderOwner !== undefined) {
      throw new ConfigError(
        `Chapters "${orderOwner}" and "${chapterId}" share order ${chapter.order}`
      );
    }
    ordersSeen.set(chapter.order, chapterId);

    const entry: Chapter = {
      ...cloneChapter(chapter),
      chapterId,
      prerequisites: chapter.prerequisites
        .map((id) => normalizeLabel(id))
        .filter((id) => id.length > 0),
    };
    positions.set(chapterId, canonical.length);
    chapters.set(chapterId, freezeChapter(entry));
    canonical.push(entry);
  }

  const aliases = new Map<string, string>();
  for (const chapter of canonical) {
    for (const alias of chapterAliases(chapter)) {
      const owner = aliases.get(alias);
      if (owner !== undefined && owner !== chapter.chapterId && policy === "reject") {
        throw new ConfigError(
          `Alias "${alias}" is claimed by both "${owner}" and "${chapter.chapterId}"`
        );
      }
      aliases.set(alias, chapter.chapterId);
    }
  }

  owned.chapters.forEach(freezeChapter);
  Object.freeze(owned.learningOutcomesOverall);
  Object.freeze(owned.chapters);

  return {
    document: Object.freeze(owned),
    order: canonical.map((chapter) => chapter.chapterId),
    chapters,
    positions,
    aliases,
  };
};

/**
 * Maps free text to a canonical chapter id: exact id first, then the alias
 * table. Returns undefined for blank or unknown labels.
 */
export const resolveChapter = (
  catalog: Catalog,
  label: string | null | undefined
): string | undefined => {
  const key = normalizeLabel(label);
  if (!key) {
    return undefined;
  }
  if (catalog.chapters.has(key)) {
    return key;
  }
  return catalog.aliases.get(key);
};

export const chapterOrder = (catalog: Catalog): string[] => [...catalog.order];

export const summarizeChapter = (
  catalog: Catalog,
  chapterId: string | null | undefined
): ChapterSummary | undefined => {
  const chapter = catalog.chapters.get(normalizeLabel(chapterId));
  if (!chapter) {
    return undefined;
  }
  return {
    chapterId: chapter.chapterId,
    title: chapter.title,
    order: chapter.order,
    weekLabel: chapter.weekLabel,
    learningOutcomes: [...chapter.learningOutcomes],
  };
};

export const summarizeChapters = (
  catalog: Catalog,
  chapterIds: Iterable<string>
): ChapterSummary[] => {
  const summaries: ChapterSummary[] = [];
  for (const chapterId of chapterIds) {
    const summary = summarizeChapter(catalog, chapterId);
    if (summary) {
      summaries.push(summary);
    }
  }
  return summaries;
};

export const sortByCatalogOrder = (
  catalog: Catalog,
  chapterIds: Iterable<string>
): string[] => {
  const known = new Set<string>();
  for (const chapterId of chapterIds) {
    if (catalog.positions.has(chapterId)) {
      known.add(chapterId);
    }
  }
  return [...known].sort(
    (a, b) => (catalog.positions.get(a) ?? 0) - (catalog.positions.get(b) ?? 0)
  );
};

export const buildCourseOutline = (catalog: Catalog): CourseOutline => ({
  unitId: catalog.document.unitId ?? null,
  unitName: catalog.document.unitName ?? null,
  description: catalog.document.description ?? null,
  learningOutcomesOverall: [...catalog.document.learningOutcomesOverall],
  chapters: catalog.order.flatMap((chapterId) => {
    const chapter = catalog.chapters.get(chapterId);
    const summary = summarizeChapter(catalog, chapterId);
    return chapter && summary
      ? [{ ...summary, prerequisites: [...chapter.prerequisites] }]
      : [];
  }),
});
