import { mkdir, rm } from 'node:fs/promises';
import { join, relative } from 'node:path';

import { ACCOUNT_CLASSES, GROUP_KINDS, REPORT_FILE } from '../core/account-class.js';
import type { GroupKind } from '../core/account-class.js';
import { buildConfig } from '../core/config.js';
import type { CliOptions, GeneratorConfig, PlanMode, ToolSettings } from '../core/config.js';
import { discoverAffectedTargets } from '../core/discovery.js';
import type { GroupWork } from '../core/execution-group.js';
import { validateModule } from '../core/module-validator.js';
import { assertGroupsSucceeded, runGroups } from '../core/orchestrator.js';
import { partitionTargets } from '../core/partition.js';
import { CommandPlanExecutor } from '../core/plan-executor.js';
import type { PlanExecutor } from '../core/plan-executor.js';
import { writeReport } from '../core/report.js';
import { createLogger } from '../ui/logger.js';
import type { Logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { GroupsFailedError } from '../utils/errors.js';

const PREVIEW_TARGETS = 5;

export interface PlanDependencies {
  logger?: Logger;
  executor?: PlanExecutor;
  discover?: (moduleName: string, tools: ToolSettings, cwd: string) => Promise<string[]>;
  validate?: (moduleName: string, tools: ToolSettings, cwd: string) => Promise<void>;
}

export interface PlanRunSummary {
  outputDir: string;
  /** Effective mode; targeted runs fall back to batch when discovery fails. */
  mode: PlanMode;
  reportPath: string;
  environments: string[];
}

export function commandLabel(tools: ToolSettings): string {
  return `${tools.executor} tg plan_all`;
}

function displayPath(config: GeneratorConfig, path: string): string {
  return relative(config.cwd, path) || '.';
}

interface ResolvedWork {
  mode: PlanMode;
  work: Record<GroupKind, GroupWork>;
}

/** Targeted work from discovery, or batch work when discovery has nothing usable. */
async function resolveWork(
  config: GeneratorConfig,
  logger: Logger,
  discover: NonNullable<PlanDependencies['discover']>,
): Promise<ResolvedWork> {
  const batch: ResolvedWork = {
    mode: 'batch',
    work: {
      commercial: { type: 'batch', moduleName: config.moduleName },
      restricted: { type: 'batch', moduleName: config.moduleName },
    },
  };
  if (config.mode === 'batch') {
    return batch;
  }

  logger.info(`Finding affected states using ${config.tools.discoveryScript}...`);
  let targets: string[];
  try {
    targets = await discover(config.moduleName, config.tools, config.cwd);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.debug(`Targeted planning failed: ${msg}`);
    logger.debug('Falling back to plan_all method...');
    return batch;
  }

  if (targets.length === 0) {
    logger.debug('Targeted planning found no plans');
    logger.debug('Falling back to plan_all method...');
    return batch;
  }

  logger.success(`Found ${targets.length} affected terraform states`);
  for (const target of targets.slice(0, PREVIEW_TARGETS)) {
    logger.debug(`  - ${target}`);
  }
  if (targets.length > PREVIEW_TARGETS) {
    logger.debug(`  ... and ${targets.length - PREVIEW_TARGETS} more`);
  }

  const groups = partitionTargets(targets, config.tools.restrictedMarker);
  return {
    mode: 'targeted',
    work: {
      commercial: { type: 'targeted', targets: groups.commercial },
      restricted: { type: 'targeted', targets: groups.restricted },
    },
  };
}

/**
 * Plan both account classes into `config.outputDir` and render the report.
 *
 * A single failed group still leaves the other group's artifact and report
 * sections on disk; the run then rejects with a GroupsFailedError. When both
 * groups fail no report is written.
 */
export async function generatePlans(
  config: GeneratorConfig,
  deps: PlanDependencies = {},
): Promise<PlanRunSummary> {
  const logger = deps.logger ?? createLogger({ verbose: config.verbose });
  const executor = deps.executor ?? new CommandPlanExecutor(config.tools, config.cwd);
  const validate = deps.validate ?? validateModule;
  const discover = deps.discover ?? discoverAffectedTargets;

  await validate(config.moduleName, config.tools, config.cwd);
  await mkdir(config.outputDir, { recursive: true });
  // A failed group writes no artifact; stale ones must not reach the report.
  await Promise.all(
    GROUP_KINDS.map((kind) =>
      rm(join(config.outputDir, ACCOUNT_CLASSES[kind].artifactFile), { force: true }),
    ),
  );

  const { mode, work } = await resolveWork(config, logger, discover);

  const spinnerText =
    mode === 'targeted'
      ? 'Running targeted plans for affected states...'
      : `Running plans for ${ACCOUNT_CLASSES.commercial.label} and ${ACCOUNT_CLASSES.restricted.label} accounts...`;

  let failure: GroupsFailedError | null = null;
  try {
    await withSpinner(
      spinnerText,
      async () => {
        assertGroupsSucceeded(
          await runGroups({ work, outputDir: config.outputDir, executor, logger }),
        );
      },
      { enabled: !config.verbose },
    );
  } catch (error) {
    if (!(error instanceof GroupsFailedError)) throw error;
    failure = error;
  }

  if (failure && failure.failures.length === GROUP_KINDS.length) {
    throw failure;
  }

  const report = await writeReport(config.outputDir, {
    moduleName: config.moduleName,
    commandLabel: commandLabel(config.tools),
  });

  if (failure) {
    logger.warn(`Partial report written to ${displayPath(config, report.path)}`);
    throw failure;
  }

  return {
    outputDir: config.outputDir,
    mode,
    reportPath: report.path,
    environments: report.environments,
  };
}

export async function planCommand(moduleName: string, options: CliOptions): Promise<void> {
  const config = await buildConfig(moduleName, options);
  const logger = createLogger({ verbose: config.verbose });

  logger.header(`Generating terraform plans for module: ${config.moduleName}`);
  logger.info(`Plans will be saved to: ${displayPath(config, config.outputDir)}/`);

  const summary = await generatePlans(config, { logger });
  const outputDir = displayPath(config, summary.outputDir);

  logger.success('Plan generation complete!');
  logger.info(`PR-ready markdown: ${join(outputDir, REPORT_FILE)}`);
  console.log();
  logger.dim('Quick commands:');
  logger.dim('  # Copy PR markdown to clipboard:');
  logger.command(`cat ${join(outputDir, REPORT_FILE)} | pbcopy`);
  logger.dim('  # View plans:');
  logger.command(`less ${join(outputDir, ACCOUNT_CLASSES.commercial.artifactFile)}`);
  logger.command(`less ${join(outputDir, ACCOUNT_CLASSES.restricted.artifactFile)}`);
  console.log();
}
