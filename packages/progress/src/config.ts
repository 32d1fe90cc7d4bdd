import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  ConfigError,
  DEFAULT_ALIAS_COLLISION_POLICY,
  DEFAULT_SLOW_THRESHOLD_MS,
  type AliasCollisionPolicy,
} from "@coursetrack/course-core";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const DEFAULT_CURRICULUM_PATH = fileURLToPath(
  new URL("../data/course.json", import.meta.url)
);

export interface CourseConfig {
  curriculumPath: string;
  logLevel: LogLevel;
  slowThresholdMs: number;
  aliasCollisions: AliasCollisionPolicy;
}

// An exported but empty variable means "use the default".
const blankAsUnset = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  CURRICULUM_PATH: z.preprocess(
    blankAsUnset,
    z.string().trim().min(1).default(DEFAULT_CURRICULUM_PATH)
  ),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("info")
  ),
  METRICS_SLOW_THRESHOLD_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().positive().default(DEFAULT_SLOW_THRESHOLD_MS)
  ),
  CURRICULUM_ALIAS_COLLISIONS: z.preprocess(
    blankAsUnset,
    z.enum(["reject", "last-write-wins"]).default(DEFAULT_ALIAS_COLLISION_POLICY)
  ),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CourseConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }

  return {
    curriculumPath: parsed.data.CURRICULUM_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    slowThresholdMs: parsed.data.METRICS_SLOW_THRESHOLD_MS,
    aliasCollisions: parsed.data.CURRICULUM_ALIAS_COLLISIONS,
  };
};
