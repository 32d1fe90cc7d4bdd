import { MetricsCollector } from "./analytics/metricsCollector";
import { loadConfig, type CourseConfig } from "./config";
import {
  CourseCatalog,
  fileCurriculumSource,
  type CurriculumSource,
} from "./domain/courseCatalog";
import { ProgressStore } from "./domain/progressStore";
import { createLogger, type Logger } from "./logger";
import { createCourseTools, type CourseTools } from "./services/courseTools";
import { ProgressEngine } from "./services/progressEngine";

export interface CourseRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<CourseConfig>;
  source?: CurriculumSource;
  logger?: Logger;
  metrics?: MetricsCollector;
  generateStudentId?: () => string;
}

export interface CourseRuntime {
  config: CourseConfig;
  logger: Logger;
  catalog: CourseCatalog;
  store: ProgressStore;
  engine: ProgressEngine;
  metrics: MetricsCollector;
  tools: CourseTools;
}

/**
 * Builds the service graph once at process start. Request handlers receive
 * the returned object by reference.
 */
export const createCourseRuntime = (options: CourseRuntimeOptions = {}): CourseRuntime => {
  const config: CourseConfig = { ...loadConfig(options.env), ...options.config };
  const logger = options.logger ?? createLogger("coursetrack", config.logLevel);

  const catalog = new CourseCatalog(
    options.source ?? fileCurriculumSource(config.curriculumPath),
    { aliasCollisions: config.aliasCollisions, logger }
  );
  const store = new ProgressStore();
  const engine = new ProgressEngine(catalog, {
    store,
    logger,
    generateStudentId: options.generateStudentId,
  });
  const metrics =
    options.metrics ??
    new MetricsCollector({ slowThresholdMs: config.slowThresholdMs, logger });

  return {
    config,
    logger,
    catalog,
    store,
    engine,
    metrics,
    tools: createCourseTools({ catalog, engine, metrics, logger }),
  };
};
