export class CourseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when configuration or the curriculum document cannot be used.
 * `issues` carries one line per failed schema check, when there were any.
 */
export class ConfigError extends CourseError {
  public readonly issues: string[];

  constructor(message: string, options: ErrorOptions & { issues?: string[] } = {}) {
    super(message, options);
    this.issues = options.issues ?? [];
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
