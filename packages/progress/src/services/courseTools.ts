import {
  ConfigError,
  MESSAGES,
  type CourseOutline,
} from "@coursetrack/course-core";
import type { MetricsCollector, MetricsSummary } from "../analytics/metricsCollector";
import type { CourseCatalog } from "../domain/courseCatalog";
import { silentLogger, type Logger } from "../logger";
import type {
  NextChapterResult,
  ProgressEngine,
  RecordResult,
  SessionState,
  SnapshotResult,
} from "./progressEngine";

export interface ErrorResult {
  status: "error";
  message: string;
}

export type ToolResult<T> = T | ErrorResult;

export interface OutlineResult extends CourseOutline {
  status: "success";
  message: string;
}

export interface MetricsSummaryResult {
  status: "success";
  message: string;
  metrics: MetricsSummary;
}

export interface StudentArgs {
  studentId?: string | null;
}

export interface RecordStudentProgressArgs extends StudentArgs {
  completedChapters?: readonly string[];
  note?: string | null;
}

export interface CourseTools {
  getCourseOutline(): Promise<ToolResult<OutlineResult>>;
  recordStudentProgress(
    args: RecordStudentProgressArgs,
    session?: SessionState
  ): Promise<ToolResult<RecordResult>>;
  getProgressSnapshot(
    args?: StudentArgs,
    session?: SessionState
  ): Promise<ToolResult<SnapshotResult>>;
  getNextChapterRecommendation(
    args?: StudentArgs,
    session?: SessionState
  ): Promise<ToolResult<NextChapterResult>>;
  getMetricsSummary(): MetricsSummaryResult;
}

export interface CourseToolsDeps {
  catalog: CourseCatalog;
  engine: ProgressEngine;
  metrics: MetricsCollector;
  logger?: Logger;
}

export const TOOL_OPERATIONS = {
  outline: "get_course_outline",
  record: "record_student_progress",
  snapshot: "get_progress_snapshot",
  next: "get_next_chapter_recommendation",
} as const;

/**
 * The operations handed to the orchestration layer. Each call is timed, and a
 * curriculum that cannot be loaded comes back as an error result instead of
 * a rejection; anything else propagates.
 */
export const createCourseTools = ({
  catalog,
  engine,
  metrics,
  logger = silentLogger,
}: CourseToolsDeps): CourseTools => {
  const settle = <T>(operation: string, pending: Promise<T>): Promise<ToolResult<T>> =>
    pending.catch((error: unknown): ErrorResult => {
      if (error instanceof ConfigError) {
        logger.warn(`${operation} failed`, { error: error.message });
        return { status: "error", message: error.message };
      }
      throw error;
    });

  const outline = metrics.timedAsync(
    TOOL_OPERATIONS.outline,
    async (): Promise<OutlineResult> => ({
      ...(await catalog.outline()),
      status: "success",
      message: MESSAGES.outlineRetrieved,
    })
  );
  const record = metrics.timedAsync(
    TOOL_OPERATIONS.record,
    (args: RecordStudentProgressArgs, session?: SessionState) =>
      engine.recordProgress(
        { studentId: args.studentId, chapters: args.completedChapters, note: args.note },
        session
      )
  );
  const snapshot = metrics.timedAsync(
    TOOL_OPERATIONS.snapshot,
    (args: StudentArgs, session?: SessionState) => engine.getSnapshot(args.studentId, session)
  );
  const next = metrics.timedAsync(
    TOOL_OPERATIONS.next,
    (args: StudentArgs, session?: SessionState) =>
      engine.getNextRecommendation(args.studentId, session)
  );

  return {
    getCourseOutline: () => settle(TOOL_OPERATIONS.outline, outline()),
    recordStudentProgress: (args, session) =>
      settle(TOOL_OPERATIONS.record, record(args, session)),
    getProgressSnapshot: (args = {}, session) =>
      settle(TOOL_OPERATIONS.snapshot, snapshot(args, session)),
    getNextChapterRecommendation: (args = {}, session) =>
      settle(TOOL_OPERATIONS.next, next(args, session)),
    getMetricsSummary: () => ({
      status: "success",
      message: MESSAGES.metricsRetrieved,
      metrics: metrics.summary(),
    }),
  };
};
