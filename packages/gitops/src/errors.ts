/**
 * Errors raised by the orchestration engine. Every failure the engine expects
 * is a GitOpsError; strategies turn these into a Failed outcome.
 */
export class GitOpsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GitOpsError';
  }
}

export class GitCommandError extends GitOpsError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | undefined,
    public readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    super(`git ${command} failed${exitCode === undefined ? '' : ` (exit ${exitCode})`}: ${stderr.trim()}`, 'GIT_COMMAND_FAILED', {
      command,
      exitCode,
    }, options);
    this.name = 'GitCommandError';
  }
}

export class TransportError extends GitOpsError {
  constructor(operation: string, repository: string, cause: unknown, code = 'TRANSPORT_FAILED') {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} ${repository} failed: ${reason}`, code, { operation, repository }, { cause });
    this.name = 'TransportError';
  }
}

export class CloneError extends TransportError {
  constructor(repository: string, cause: unknown) {
    super('clone', repository, cause, 'CLONE_FAILED');
    this.name = 'CloneError';
  }
}

export class DriftError extends GitOpsError {
  constructor(public readonly paths: string[]) {
    super(`There are some extra file updates: ${paths.join(', ')}`, 'DRIFT_DETECTED', { paths });
    this.name = 'DriftError';
  }
}

export class NotFoundError extends GitOpsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class AmbiguousResultError extends GitOpsError {
  constructor(public readonly count: number) {
    super(`Unsupported multiple pull requests: the apply tool created ${count}`, 'AMBIGUOUS_RESULT', { count });
    this.name = 'AmbiguousResultError';
  }
}

export class UnsafeCleanError extends GitOpsError {
  constructor(localPath: string, cause?: unknown) {
    super(`Refusing to remove ${localPath}: no .git directory found`, 'UNSAFE_CLEAN', { localPath }, { cause });
    this.name = 'UnsafeCleanError';
  }
}

export class InvalidStateError extends GitOpsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_STATE', details);
    this.name = 'InvalidStateError';
  }
}

export class VersionLookupError extends GitOpsError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'VERSION_LOOKUP', details, options);
    this.name = 'VersionLookupError';
  }
}

export class ApplyToolError extends GitOpsError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'APPLY_TOOL_FAILED', details, options);
    this.name = 'ApplyToolError';
  }
}

export class OverwriteError extends GitOpsError {
  constructor(filePath: string, reason: string) {
    super(`Unable to update ${filePath}: ${reason}`, 'OVERWRITE_FAILED', { filePath });
    this.name = 'OverwriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
