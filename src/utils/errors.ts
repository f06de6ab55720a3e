import type { GroupKind } from '../core/account-class.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Targeted discovery could not produce a target list. Recovered by the caller
 * (batch mode), so it never reaches the entry point.
 */
export class DiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

export class ExecutionError extends Error {
  /** Target identifier, or `null` for a batch invocation. */
  readonly target: string | null;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    target: string | null,
    cause: string,
    options: { exitCode?: number | null; stderr?: string } = {},
  ) {
    super(target ? `failed to run plan for ${target}: ${cause}` : `plan failed: ${cause}`);
    this.name = 'ExecutionError';
    this.target = target;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

export interface GroupFailure {
  kind: GroupKind;
  error: Error;
}

export class GroupsFailedError extends Error {
  readonly failures: GroupFailure[];

  constructor(failures: GroupFailure[]) {
    super(failures.map((f) => `${f.kind} plans failed: ${f.error.message}`).join('; '));
    this.name = 'GroupsFailedError';
    this.failures = failures;
  }
}

export class ReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportError';
  }
}
