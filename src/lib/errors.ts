export enum BlogErrorType {
  CONFIGURATION = 'configuration_error',
  FRONT_MATTER = 'front_matter_error',
  NOT_FOUND = 'not_found',
  IO = 'io_error',
  BUILD = 'build_error',
}

export class BlogError extends Error {
  readonly type: BlogErrorType;
  readonly details?: Record<string, unknown>;

  constructor(message: string, type: BlogErrorType, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BlogError';
    this.type = type;
    this.details = details;
  }

  toString(): string {
    return `[${this.type}] ${this.message}`;
  }
}

export class ConfigError extends BlogError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, BlogErrorType.CONFIGURATION, { problems });
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export type FrontMatterIssue = {
  /** Dotted path of the offending key, `(front matter)` when the block itself is broken. */
  field: string;
  message: string;
};

export class FrontMatterError extends BlogError {
  readonly file: string;
  readonly issues: FrontMatterIssue[];

  constructor(file: string, issues: FrontMatterIssue[]) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join('; ');
    super(`${file}: ${summary}`, BlogErrorType.FRONT_MATTER, { file });
    this.name = 'FrontMatterError';
    this.file = file;
    this.issues = issues;
  }
}

export class PostNotFoundError extends BlogError {
  readonly slug: string;

  constructor(slug: string) {
    super(`No post with slug "${slug}"`, BlogErrorType.NOT_FOUND, { slug });
    this.name = 'PostNotFoundError';
    this.slug = slug;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return JSON.stringify(error) ?? String(error);
}
