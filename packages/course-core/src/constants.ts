import type { AliasCollisionPolicy } from "./types";

export const DEFAULT_STUDENT_ID = "default_student";
export const STUDENT_ID_SESSION_KEY = "progress_student_id";
export const STUDENT_ID_PREFIX = "student_";
export const STUDENT_ID_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz";
export const STUDENT_ID_LENGTH = 21;

export const ORDINAL_ALIAS_PREFIX = "chapter";
export const CSV_LIST_SEPARATOR = "|";

export const DEFAULT_ALIAS_COLLISION_POLICY: AliasCollisionPolicy = "reject";
export const DEFAULT_SLOW_THRESHOLD_MS = 1000;

export const MESSAGES = {
  progressUpdated: "Progress updated",
  noNewChapters: "No new chapters recorded",
  snapshotRetrieved: "Progress snapshot retrieved",
  nextChapterComputed: "Next chapter recommendation computed",
  outlineRetrieved: "Course outline retrieved",
  metricsRetrieved: "Metrics summary retrieved",
} as const;
