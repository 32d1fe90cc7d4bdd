import type { StudentProgress } from "@coursetrack/course-core";

const EMPTY_PROGRESS: StudentProgress = Object.freeze({
  completed: Object.freeze([]),
  notes: Object.freeze([]),
});

/**
 * In-memory, process-lifetime progress records keyed by canonical student id.
 * Records are frozen and replaced whole on every write.
 */
export class ProgressStore {
  private records = new Map<string, StudentProgress>();

  public get(studentId: string): StudentProgress | undefined {
    return this.records.get(studentId);
  }

  public getOrEmpty(studentId: string): StudentProgress {
    return this.records.get(studentId) ?? EMPTY_PROGRESS;
  }

  public put(studentId: string, progress: StudentProgress): StudentProgress {
    const record: StudentProgress = Object.freeze({
      completed: Object.freeze([...progress.completed]),
      notes: Object.freeze([...progress.notes]),
    });
    this.records.set(studentId, record);
    return record;
  }
}
