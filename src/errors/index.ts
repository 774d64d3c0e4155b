export class MetMergeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Configuration file missing, unreadable or invalid
export class ConfigError extends MetMergeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

// No daily file in the requested range could be loaded
export class NoDataError extends MetMergeError {}

// No input exposes a usable timestamp column, or the merged schema was misused
export class MergeError extends MetMergeError {}

export class HeaderParseError extends MetMergeError {}

export class OutputExistsError extends MetMergeError {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(`Output files already exist: ${paths.join(', ')}. Use --overwrite to overwrite existing files.`);
    this.paths = paths;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
