import { customAlphabet } from "nanoid";
import {
  buildProgressSnapshot,
  MESSAGES,
  normalizeStudentId,
  resolveChapter,
  sortByCatalogOrder,
  summarizeChapters,
  STUDENT_ID_ALPHABET,
  STUDENT_ID_LENGTH,
  STUDENT_ID_PREFIX,
  STUDENT_ID_SESSION_KEY,
  type ChapterSummary,
  type ProgressSnapshot,
} from "@coursetrack/course-core";
import type { CourseCatalog } from "../domain/courseCatalog";
import { KeyedLock } from "../domain/keyedLock";
import { ProgressStore } from "../domain/progressStore";
import { silentLogger, type Logger } from "../logger";

/** Per-conversation key-value carrier owned by the caller. A `Map` fits. */
export interface SessionState {
  get(key: string): unknown;
  set(key: string, value: unknown): unknown;
}

export interface RecordProgressRequest {
  studentId?: string | null;
  chapters?: readonly string[];
  note?: string | null;
}

export interface RecordResult {
  status: "success";
  studentId: string;
  addedChapters: ChapterSummary[];
  snapshot: ProgressSnapshot;
  message: string;
}

export interface SnapshotResult extends ProgressSnapshot {
  status: "success";
  message: string;
}

export interface NextChapterResult {
  status: "success";
  studentId: string;
  nextChapter: ChapterSummary | null;
  completedCount: number;
  message: string;
}

export interface ProgressEngineOptions {
  store?: ProgressStore;
  logger?: Logger;
  generateStudentId?: () => string;
}

const createStudentToken = customAlphabet(STUDENT_ID_ALPHABET, STUDENT_ID_LENGTH);

export const generateStudentId = (): string => `${STUDENT_ID_PREFIX}${createStudentToken()}`;

export class ProgressEngine {
  private readonly store: ProgressStore;
  private readonly locks = new KeyedLock();
  private readonly logger: Logger;
  private readonly generateStudentId: () => string;

  constructor(
    private readonly catalog: CourseCatalog,
    options: ProgressEngineOptions = {}
  ) {
    this.store = options.store ?? new ProgressStore();
    this.logger = options.logger ?? silentLogger;
    this.generateStudentId = options.generateStudentId ?? generateStudentId;
  }

  /**
   * An explicit id always wins and is written back to the session. Without
   * one, the session's id is reused, or a fresh one is minted and stored.
   */
  public resolveStudent(explicitId?: string | null, session?: SessionState): string {
    if (explicitId) {
      const studentId = normalizeStudentId(explicitId);
      session?.set(STUDENT_ID_SESSION_KEY, studentId);
      return studentId;
    }

    const existing = session?.get(STUDENT_ID_SESSION_KEY);
    if (typeof existing === "string" && existing.length > 0) {
      return existing;
    }

    const generated = this.generateStudentId();
    session?.set(STUDENT_ID_SESSION_KEY, generated);
    this.logger.debug("Assigned student id", { studentId: generated });
    return generated;
  }

  public async recordProgress(
    request: RecordProgressRequest,
    session?: SessionState
  ): Promise<RecordResult> {
    const catalog = await this.catalog.load();
    const studentId = this.resolveStudent(request.studentId, session);

    return this.locks.run(studentId, (): RecordResult => {
      const current = this.store.getOrEmpty(studentId);
      const completed = new Set(current.completed);
      const added: string[] = [];

      for (const label of request.chapters ?? []) {
        const chapterId = resolveChapter(catalog, label);
        if (chapterId && !completed.has(chapterId)) {
          completed.add(chapterId);
          added.push(chapterId);
        }
      }

      const note = request.note ?? "";
      const stored = this.store.put(studentId, {
        completed: sortByCatalogOrder(catalog, completed),
        notes: note ? [...current.notes, note] : current.notes,
      });

      if (added.length > 0) {
        this.logger.info("Recorded chapters", { studentId, added });
      }

      return {
        status: "success",
        studentId,
        addedChapters: summarizeChapters(catalog, added),
        snapshot: buildProgressSnapshot(catalog, studentId, stored),
        message: added.length > 0 ? MESSAGES.progressUpdated : MESSAGES.noNewChapters,
      };
    });
  }

  public async getSnapshot(
    studentId?: string | null,
    session?: SessionState
  ): Promise<SnapshotResult> {
    const catalog = await this.catalog.load();
    const resolved = this.resolveStudent(studentId, session);
    return {
      ...buildProgressSnapshot(catalog, resolved, this.store.get(resolved)),
      status: "success",
      message: MESSAGES.snapshotRetrieved,
    };
  }

  public async getNextRecommendation(
    studentId?: string | null,
    session?: SessionState
  ): Promise<NextChapterResult> {
    const catalog = await this.catalog.load();
    const resolved = this.resolveStudent(studentId, session);
    const snapshot = buildProgressSnapshot(catalog, resolved, this.store.get(resolved));
    return {
      status: "success",
      studentId: resolved,
      nextChapter: snapshot.nextChapter,
      completedCount: snapshot.completedChapters.length,
      message: MESSAGES.nextChapterComputed,
    };
  }
}
