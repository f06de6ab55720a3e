import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { ACCOUNT_CLASSES } from './account-class.js';
import type { GroupKind } from './account-class.js';
import type { PlanExecutor } from './plan-executor.js';
import type { Logger } from '../ui/logger.js';

export type GroupWork =
  | { type: 'batch'; moduleName: string }
  | { type: 'targeted'; targets: readonly string[] };

export interface ExecutionGroupResult {
  kind: GroupKind;
  rawOutput: string;
  artifactPath: string;
  /** False when the sentinel was written because there was nothing to plan. */
  executed: boolean;
}

export interface ExecutionGroupOptions {
  kind: GroupKind;
  work: GroupWork;
  outputDir: string;
  executor: PlanExecutor;
  logger: Logger;
}

/**
 * Plan every target of one account class and persist the captured output.
 *
 * Targeted work runs one invocation per target, strictly in order, each
 * output followed by a newline. The first failing invocation rejects the
 * group; later targets are not started and no artifact is written.
 */
export async function runExecutionGroup(options: ExecutionGroupOptions): Promise<ExecutionGroupResult> {
  const { kind, work, outputDir, executor, logger } = options;
  const profile = ACCOUNT_CLASSES[kind];
  const artifactPath = join(outputDir, profile.artifactFile);

  let rawOutput: string;
  let executed = true;

  if (work.type === 'batch') {
    logger.debug(`→ Running ${profile.label} account plans...`);
    rawOutput = await executor.plan({ type: 'batch', kind, moduleName: work.moduleName });
  } else if (work.targets.length === 0) {
    rawOutput = profile.sentinel;
    executed = false;
  } else {
    logger.debug(`→ Running ${work.targets.length} ${profile.label} plans...`);
    const outputs: string[] = [];
    for (const target of work.targets) {
      logger.debug(`  Planning: ${target}`);
      outputs.push(await executor.plan({ type: 'target', kind, target }));
    }
    rawOutput = outputs.map((output) => `${output}\n`).join('');
  }

  await writeFile(artifactPath, rawOutput, 'utf-8');
  return { kind, rawOutput, artifactPath, executed };
}
