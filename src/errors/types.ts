/**
 * Error types for the filing research CLI
 *
 * Every failure a user can act on is a CLIError carrying a hint (what to do
 * next) and an exit code from ExitCode, so scripts can tell a missing key
 * from a missing filing without parsing messages.
 */

/**
 * Process exit codes. 0 is success and never used for an error.
 */
export const ExitCode = {
  General: 1,
  Config: 2,
  Document: 3,
  Credentials: 4,
  Database: 5,
  EmbeddingMismatch: 6,
  ServiceUnavailable: 7,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown under the message */
  public readonly hint?: string;

  public readonly code: ExitCode;

  constructor(message: string, hint?: string, code: ExitCode = ExitCode.General) {
    super(message);
    // instanceof must keep working on subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * The filing path doesn't exist or isn't a file.
 */
export class DocumentNotFoundError extends CLIError {
  public readonly path: string;

  constructor(path: string) {
    super(
      `Document does not exist: ${path}`,
      'Check the path, or run: fra config set document.path <file>',
      ExitCode.Document
    );
    this.name = 'DocumentNotFoundError';
    this.path = path;
  }
}

/**
 * The filing was read but held no usable text.
 */
export class DocumentParseError extends CLIError {
  public readonly sourceId: string;

  constructor(sourceId: string, reason: string) {
    super(
      `Could not parse document "${sourceId}": ${reason}`,
      'Make sure the file is the HTML version of the filing',
      ExitCode.Document
    );
    this.name = 'DocumentParseError';
    this.sourceId = sourceId;
  }
}

export class IndexNotBuiltError extends CLIError {
  constructor(sourceId: string) {
    super(`No index found for source "${sourceId}"`, 'Run: fra index <file>  to build it', ExitCode.Document);
    this.name = 'IndexNotBuiltError';
  }
}

/**
 * Bad TOML, an unknown key, or a value outside its range.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: fra config list  to see valid options', ExitCode.Config);
    this.name = 'ConfigError';
  }
}

/**
 * A required key is missing or malformed.
 *
 * @param service - Display name, e.g. "Tavily"
 * @param envVar - Defaults to `${SERVICE}_API_KEY`
 */
export class APIKeyError extends CLIError {
  constructor(service: string, envVar?: string) {
    super(
      `${service} API key not configured`,
      `Set the ${envVar ?? `${service.toUpperCase()}_API_KEY`} environment variable (a .env file works too)`,
      ExitCode.Credentials
    );
    this.name = 'APIKeyError';
  }
}

/**
 * SQLite failed; the original error is kept as `cause`.
 */
export class DatabaseError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: fra status  to check the index database', ExitCode.Database);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * User input rejected before any work started. Each issue is listed in
 * the hint.
 */
export class ValidationError extends CLIError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      message,
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again',
      ExitCode.General
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
