import { execFile } from 'node:child_process';
import { resolve as resolvePath } from 'node:path';

import type { ToolSettings } from './config.js';
import { fileExists } from '../utils/fs.js';
import { DiscoveryError } from '../utils/errors.js';

const TERRAGRUNT_FILE_SUFFIX = '/terragrunt.hcl';
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Pull target directories out of the discovery script's output. Only lines
 * suggesting `<executor> tg plan ... -w <path>/terragrunt.hcl` count.
 */
export function parseAffectedTargets(output: string, executor: string): string[] {
  const marker = `${executor} tg plan`;
  const targets: string[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line.includes(marker)) continue;

    const parts = line.split(/\s+/);
    const flagIndex = parts.indexOf('-w');
    if (flagIndex === -1 || flagIndex + 1 >= parts.length) continue;

    targets.push(parts[flagIndex + 1].replace(TERRAGRUNT_FILE_SUFFIX, ''));
  }

  return targets;
}

export async function discoverAffectedTargets(
  moduleName: string,
  tools: ToolSettings,
  cwd: string,
): Promise<string[]> {
  const script = tools.discoveryScript;
  if (!(await fileExists(resolvePath(cwd, script)))) {
    throw new DiscoveryError(`${script} not found in ${cwd}`);
  }

  const stdout = await new Promise<string>((resolve, reject) => {
    execFile(
      script,
      [moduleName, '.'],
      { cwd, encoding: 'utf-8', maxBuffer: MAX_OUTPUT_BYTES },
      (error, out) => {
        if (error) {
          reject(new DiscoveryError(`failed to run ${script}: ${error.message}`));
          return;
        }
        resolve(out);
      },
    );
  });

  return parseAffectedTargets(stdout, tools.executor);
}
