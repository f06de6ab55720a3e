import { GROUP_KINDS } from './account-class.js';
import type { GroupKind } from './account-class.js';
import { runExecutionGroup } from './execution-group.js';
import type { ExecutionGroupResult, GroupWork } from './execution-group.js';
import type { PlanExecutor } from './plan-executor.js';
import type { Logger } from '../ui/logger.js';
import { GroupsFailedError } from '../utils/errors.js';
import type { GroupFailure } from '../utils/errors.js';

export type GroupOutcome =
  | { kind: GroupKind; status: 'succeeded'; result: ExecutionGroupResult }
  | { kind: GroupKind; status: 'failed'; error: Error };

export interface OrchestrationResult {
  outcomes: Record<GroupKind, GroupOutcome>;
  failures: GroupFailure[];
}

export interface OrchestratorOptions {
  work: Record<GroupKind, GroupWork>;
  outputDir: string;
  executor: PlanExecutor;
  logger: Logger;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

function toOutcome(
  kind: GroupKind,
  entry: PromiseSettledResult<ExecutionGroupResult>,
): GroupOutcome {
  if (entry.status === 'fulfilled') {
    return { kind, status: 'succeeded', result: entry.value };
  }
  return { kind, status: 'failed', error: toError(entry.reason) };
}

/**
 * Run the commercial and restricted groups concurrently and wait for both,
 * whatever either one does. Failures are collected, not thrown.
 */
export async function runGroups(options: OrchestratorOptions): Promise<OrchestrationResult> {
  const run = (kind: GroupKind) =>
    runExecutionGroup({
      kind,
      work: options.work[kind],
      outputDir: options.outputDir,
      executor: options.executor,
      logger: options.logger,
    });

  const [commercial, restricted] = await Promise.allSettled([
    run('commercial'),
    run('restricted'),
  ]);

  const outcomes: Record<GroupKind, GroupOutcome> = {
    commercial: toOutcome('commercial', commercial),
    restricted: toOutcome('restricted', restricted),
  };

  const failures: GroupFailure[] = [];
  for (const kind of GROUP_KINDS) {
    const outcome = outcomes[kind];
    if (outcome.status === 'failed') {
      failures.push({ kind, error: outcome.error });
    }
  }

  return { outcomes, failures };
}

export function assertGroupsSucceeded(result: OrchestrationResult): void {
  if (result.failures.length > 0) {
    throw new GroupsFailedError(result.failures);
  }
}
