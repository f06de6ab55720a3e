import { relative, resolve } from 'node:path';

import { loadToolSettings } from '../core/config.js';
import { writeReport } from '../core/report.js';
import { createLogger } from '../ui/logger.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { commandLabel } from './plan.js';

/** Re-render pr-ready.md from the raw artifacts of an earlier run. */
export async function reportCommand(
  moduleName: string,
  dir: string,
  options: { verbose?: boolean },
): Promise<void> {
  const cwd = process.cwd();
  const logger = createLogger({ verbose: options.verbose });
  const outputDir = resolve(cwd, dir);

  if (!(await isDirectory(outputDir))) {
    throw new ValidationError(`Output directory not found: ${dir}`);
  }

  const tools = await loadToolSettings(cwd);
  const report = await writeReport(outputDir, {
    moduleName,
    commandLabel: commandLabel(tools),
  });

  if (report.environments.length === 0) {
    logger.warn('No plan changes found in the raw plan files.');
  } else {
    logger.debug(`Environments: ${report.environments.join(', ')}`);
  }
  logger.success(`PR-ready markdown: ${relative(cwd, report.path)}`);
}
