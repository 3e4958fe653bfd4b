import type { LayerStage } from './types';

export type BuildErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_PARSE_ERROR'
  | 'STAGE_FAILED'
  | 'IDENTITY_CREATION_ERROR'
  | 'FINALIZATION_POLICY_VIOLATION'
  | 'CONFIG_ERROR';

/**
 * Base class for every error that aborts a build. Builds never recover from
 * one of these: the pipeline stops and no image is produced.
 */
export abstract class BuildError extends Error {
  abstract readonly code: BuildErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ManifestNotFoundError extends BuildError {
  readonly code = 'MANIFEST_NOT_FOUND';

  constructor(public readonly manifestPath: string, options?: { cause?: unknown }) {
    super(`Dependency manifest not found: ${manifestPath}`, options);
  }
}

export class ManifestParseError extends BuildError {
  readonly code = 'MANIFEST_PARSE_ERROR';

  constructor(
    public readonly manifestPath: string,
    public readonly line: number,
    public readonly content: string,
    reason: string
  ) {
    super(`${manifestPath}:${line}: ${reason} ('${content}')`);
  }
}

export class StageFailedError extends BuildError {
  readonly code = 'STAGE_FAILED';

  constructor(public readonly state: LayerStage, cause: unknown) {
    super(`Stage ${state} failed: ${describeCause(cause)}`, { cause });
  }
}

export class IdentityCreationError extends BuildError {
  readonly code = 'IDENTITY_CREATION_ERROR';

  constructor(public readonly username: string, reason: string) {
    super(`Cannot create runtime identity '${username}': ${reason}`);
  }
}

export class FinalizationPolicyViolationError extends BuildError {
  readonly code = 'FINALIZATION_POLICY_VIOLATION';
}

export class ConfigError extends BuildError {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
