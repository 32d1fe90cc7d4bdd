export { createCourseRuntime } from "./runtime";
export type { CourseRuntime, CourseRuntimeOptions } from "./runtime";
export { loadConfig, DEFAULT_CURRICULUM_PATH } from "./config";
export type { CourseConfig } from "./config";
export { createLogger, silentLogger, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel, LogMeta } from "./logger";
export {
  CourseCatalog,
  fileCurriculumSource,
  documentCurriculumSource,
} from "./domain/courseCatalog";
export type { CourseCatalogOptions, CurriculumSource } from "./domain/courseCatalog";
export { ProgressStore } from "./domain/progressStore";
export { KeyedLock } from "./domain/keyedLock";
export { ProgressEngine, generateStudentId } from "./services/progressEngine";
export type {
  NextChapterResult,
  ProgressEngineOptions,
  RecordProgressRequest,
  RecordResult,
  SessionState,
  SnapshotResult,
} from "./services/progressEngine";
export { createCourseTools, TOOL_OPERATIONS } from "./services/courseTools";
export type {
  CourseTools,
  CourseToolsDeps,
  ErrorResult,
  MetricsSummaryResult,
  OutlineResult,
  RecordStudentProgressArgs,
  StudentArgs,
  ToolResult,
} from "./services/courseTools";
export { MetricsCollector } from "./analytics/metricsCollector";
export type {
  Metric,
  MetricMetadata,
  MetricsCollectorOptions,
  MetricsSummary,
  OperationSummary,
  TimerScope,
} from "./analytics/metricsCollector";
