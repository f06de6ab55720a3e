import { join } from 'node:path';

import type { ToolSettings } from './config.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';

export function moduleDirName(moduleName: string, tools: ToolSettings): string {
  return `${tools.modulePrefix}${moduleName}`;
}

export async function validateModule(moduleName: string, tools: ToolSettings, cwd: string): Promise<void> {
  const dir = moduleDirName(moduleName, tools);
  if (!(await isDirectory(join(cwd, dir)))) {
    throw new ValidationError(
      `module ${dir} not found in current directory.\nMake sure you're running this from the modules repository root.`,
    );
  }
}
