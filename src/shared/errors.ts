/**
 * Error taxonomy for repotree
 */

export type ErrorCode =
  | 'MALFORMED_INDENTATION'
  | 'INVALID_ENTRY'
  | 'OVERLAPPING_ROOTS'
  | 'DIRECTORY_CONFLICT'
  | 'REPOSITORY_NAME'
  | 'PULL_FAILURE'
  | 'EXTERNAL_TOOL_FAILURE'
  | 'GIT_COMMAND_FAILED';

export class RepoTreeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============================================================================
// Layout (fatal for the whole run)
// ============================================================================

export class LayoutParseError extends RepoTreeError {
  readonly line: number;
  readonly text: string;

  constructor(code: ErrorCode, reason: string, line: number, text: string) {
    super(code, `Line ${line}: ${reason}: "${text.trim()}"`);
    this.line = line;
    this.text = text;
  }
}

export class MalformedIndentationError extends LayoutParseError {
  constructor(reason: string, line: number, text: string) {
    super('MALFORMED_INDENTATION', reason, line, text);
  }
}

export class InvalidEntryError extends LayoutParseError {
  constructor(reason: string, line: number, text: string) {
    super('INVALID_ENTRY', reason, line, text);
  }
}

export class OverlappingRootsError extends LayoutParseError {
  constructor(reason: string, line: number, text: string) {
    super('OVERLAPPING_ROOTS', reason, line, text);
  }
}

// ============================================================================
// Per-node (isolated to the node that raised them)
// ============================================================================

export class DirectoryConflictError extends RepoTreeError {
  constructor(readonly directory: string, reason: string) {
    super('DIRECTORY_CONFLICT', `${directory}: ${reason}`);
  }
}

export class RepositoryNameError extends RepoTreeError {
  constructor(readonly url: string) {
    super('REPOSITORY_NAME', `Cannot derive a checkout directory name from ${url}`);
  }
}

export class PullFailureError extends RepoTreeError {
  constructor(readonly directory: string, options?: { cause?: unknown }) {
    super('PULL_FAILURE', `Pull failed in ${directory}`, options);
  }
}

export class ExternalToolFailureError extends RepoTreeError {
  constructor(readonly command: string, options?: { cause?: unknown }) {
    super('EXTERNAL_TOOL_FAILURE', `Could not run ${command}`, options);
  }
}

export class GitCommandError extends RepoTreeError {
  constructor(
    readonly args: string[],
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const detail = stderr.trim().split('\n')[0] || `exit code ${exitCode ?? 'unknown'}`;
    super('GIT_COMMAND_FAILED', `git ${args.join(' ')} failed: ${detail}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
