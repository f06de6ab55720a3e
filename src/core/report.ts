import { join } from 'node:path';
import { writeFile } from 'node:fs/promises';

import { ACCOUNT_CLASSES, GROUP_KINDS, REPORT_FILE, isSentinel } from './account-class.js';
import type { GroupKind } from './account-class.js';
import { scanPlanOutput } from './plan-scanner.js';
import type { ActionRecord } from './plan-scanner.js';
import { readFileIfExists } from '../utils/fs.js';
import { ReportError } from '../utils/errors.js';

export const REPORT_TITLE = '**Terraform plan**';

export interface EnvironmentGroup {
  name: string;
  regions: Set<string>;
  blocksByRegion: Map<string, string>;
}

export interface ReportContext {
  moduleName: string;
  /** Shown in each environment heading, e.g. `kitman tg plan_all`. */
  commandLabel: string;
}

/**
 * Fold records in order into environment groups. A repeated
 * (environment, region) pair overwrites the earlier block.
 */
export function groupRecords(records: Iterable<ActionRecord>): Map<string, EnvironmentGroup> {
  const environments = new Map<string, EnvironmentGroup>();
  for (const record of records) {
    let group = environments.get(record.environment);
    if (!group) {
      group = { name: record.environment, regions: new Set(), blocksByRegion: new Map() };
      environments.set(record.environment, group);
    }
    group.regions.add(record.region);
    group.blocksByRegion.set(record.region, record.blockText);
  }
  return environments;
}

function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function renderEnvironment(group: EnvironmentGroup, context: ReportContext): string {
  let out =
    `## [environment: ${group.name}] - [command: ${context.commandLabel}] - ` +
    `[module: ${context.moduleName}]\n\n`;

  for (const region of [...group.regions].sort(byCodeUnit)) {
    const block = group.blocksByRegion.get(region);
    if (!block) continue;
    out += `<details>\n<summary>${region}</summary>\n\n\`\`\`bash\n`;
    out += block;
    out += '\n```\n\n</details>\n\n';
  }
  return out;
}

/** Render grouped records as environment sections, sorted by name. */
export function renderSections(
  environments: Map<string, EnvironmentGroup>,
  context: ReportContext,
): string {
  return [...environments.keys()]
    .sort(byCodeUnit)
    .map((name) => {
      const group = environments.get(name);
      return group ? renderEnvironment(group, context) : '';
    })
    .join('');
}

/** Records of one artifact; missing, empty and sentinel content yield none. */
export function recordsFromArtifact(content: string | null, kind: GroupKind): ActionRecord[] {
  if (!content || isSentinel(content)) {
    return [];
  }
  return scanPlanOutput(content, kind);
}

export type ArtifactContents = Record<GroupKind, string | null>;

export interface AssembledReport {
  markdown: string;
  environments: string[];
}

/**
 * Build the whole report from the raw artifact contents. Commercial records
 * are folded before restricted ones, so a restricted block wins a collision.
 */
export function assembleReport(artifacts: ArtifactContents, context: ReportContext): AssembledReport {
  const records = GROUP_KINDS.flatMap((kind) => recordsFromArtifact(artifacts[kind], kind));
  const environments = groupRecords(records);
  return {
    markdown: `${REPORT_TITLE}\n\n${renderSections(environments, context)}`,
    environments: [...environments.keys()].sort(byCodeUnit),
  };
}

/**
 * Read both raw artifacts from `outputDir` and write `pr-ready.md` next to
 * them. No executor is involved.
 */
export async function writeReport(
  outputDir: string,
  context: ReportContext,
): Promise<AssembledReport & { path: string }> {
  const artifacts: ArtifactContents = {
    commercial: await readFileIfExists(join(outputDir, ACCOUNT_CLASSES.commercial.artifactFile)),
    restricted: await readFileIfExists(join(outputDir, ACCOUNT_CLASSES.restricted.artifactFile)),
  };

  const report = assembleReport(artifacts, context);
  const path = join(outputDir, REPORT_FILE);
  try {
    await writeFile(path, report.markdown, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ReportError(`Failed to write ${path}: ${msg}`);
  }
  return { ...report, path };
}
