import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import {
  buildCatalog,
  buildCourseOutline,
  chapterOrder,
  ConfigError,
  describeError,
  parseCurriculumCsv,
  parseCurriculumJson,
  resolveChapter,
  summarizeChapter,
  type AliasCollisionPolicy,
  type Catalog,
  type ChapterSummary,
  type CourseOutline,
  type CurriculumDocument,
} from "@coursetrack/course-core";
import { silentLogger, type Logger } from "../logger";

export type CurriculumSource = () => Promise<CurriculumDocument>;

export const fileCurriculumSource =
  (path: string): CurriculumSource =>
  async () => {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      throw new ConfigError(`Curriculum document could not be read from ${path}`, {
        cause: error,
      });
    }
    return extname(path).toLowerCase() === ".csv"
      ? parseCurriculumCsv(text)
      : parseCurriculumJson(text);
  };

export const documentCurriculumSource =
  (document: CurriculumDocument): CurriculumSource =>
  async () =>
    document;

export interface CourseCatalogOptions {
  aliasCollisions?: AliasCollisionPolicy;
  logger?: Logger;
}

/**
 * Loads the curriculum once and serves ordering and chapter lookups from it.
 * Concurrent first calls share one load; a failed load publishes nothing and
 * the next call starts over.
 */
export class CourseCatalog {
  private catalog: Catalog | null = null;
  private pending: Promise<Catalog> | null = null;
  private readonly aliasCollisions?: AliasCollisionPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly source: CurriculumSource,
    options: CourseCatalogOptions = {}
  ) {
    this.aliasCollisions = options.aliasCollisions;
    this.logger = options.logger ?? silentLogger;
  }

  public get isLoaded(): boolean {
    return this.catalog !== null;
  }

  public load(): Promise<Catalog> {
    if (this.catalog) {
      return Promise.resolve(this.catalog);
    }
    if (!this.pending) {
      this.pending = this.initialize().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  public async resolve(label: string | null | undefined): Promise<string | undefined> {
    return resolveChapter(await this.load(), label);
  }

  public async order(): Promise<string[]> {
    return chapterOrder(await this.load());
  }

  public async summary(chapterId: string): Promise<ChapterSummary | undefined> {
    return summarizeChapter(await this.load(), chapterId);
  }

  public async outline(): Promise<CourseOutline> {
    return buildCourseOutline(await this.load());
  }

  private async initialize(): Promise<Catalog> {
    try {
      const document = await this.source();
      const catalog = buildCatalog(document, {
        aliasCollisions: this.aliasCollisions,
      });
      this.catalog = catalog;
      this.logger.info("Course catalog loaded", {
        unitId: document.unitId,
        chapters: catalog.order.length,
      });
      return catalog;
    } catch (error) {
      this.logger.error("Course catalog failed to load", {
        error: describeError(error),
      });
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Curriculum could not be loaded: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
