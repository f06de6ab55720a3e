import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';

import { fileExists } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';

export const CONFIG_FILENAME = 'tg-plan-report.config.json';

export const toolSettingsSchema = z
  .object({
    executor: z.string().min(1).default('kitman'),
    discoveryScript: z.string().min(1).default('./affected-modules.sh'),
    modulePrefix: z.string().default('terragrunt_'),
    restrictedMarker: z.string().min(1).default('govcloud'),
    restrictedOrganizations: z.string().min(1).default('govcloud-staging|govcloud-production'),
    restrictedRegions: z.string().min(1).default('us-gov-west-1'),
  })
  .strict();

export type ToolSettings = z.infer<typeof toolSettingsSchema>;

export type PlanMode = 'batch' | 'targeted';

export interface GeneratorConfig {
  moduleName: string;
  /** Absolute path of the directory receiving the artifacts. */
  outputDir: string;
  verbose: boolean;
  mode: PlanMode;
  cwd: string;
  tools: ToolSettings;
}

export interface CliOptions {
  verbose?: boolean;
  targeted?: boolean;
  output?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `pr-plans-YYYYMMDD-HHMMSS` in local time. */
export function defaultOutputDirName(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `pr-plans-${date}-${time}`;
}

export async function loadToolSettings(cwd: string): Promise<ToolSettings> {
  const configPath = join(cwd, CONFIG_FILENAME);
  if (!(await fileExists(configPath))) {
    return toolSettingsSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid ${CONFIG_FILENAME}: ${msg}`);
  }

  const parsed = toolSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`Invalid ${CONFIG_FILENAME}: ${issues}`);
  }
  return parsed.data;
}

export async function buildConfig(
  moduleName: string,
  options: CliOptions,
  cwd: string = process.cwd(),
  now: Date = new Date(),
): Promise<GeneratorConfig> {
  if (!moduleName.trim()) {
    throw new ValidationError('Module name must not be empty');
  }

  const output = options.output || defaultOutputDirName(now);
  return {
    moduleName,
    outputDir: isAbsolute(output) ? output : resolve(cwd, output),
    verbose: options.verbose ?? false,
    mode: options.targeted ? 'targeted' : 'batch',
    cwd,
    tools: await loadToolSettings(cwd),
  };
}
