import { Command } from 'commander';
import { createRequire } from 'node:module';

import type { CliOptions as PlanCliOptions } from './core/config.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string; description: string };

export const program = new Command()
  .name('tg-plan-report')
  .description(pkg.description)
  .version(pkg.version)
  .argument('<module>', 'Module to plan, e.g. s3_malware_protection')
  .option('-v, --verbose', 'Enable verbose output')
  .option('-t, --targeted', 'Plan only the states reported by the discovery script')
  .option('-o, --output <dir>', 'Custom output directory (default: pr-plans-TIMESTAMP)')
  .addHelpText(
    'after',
    `
Examples:
  tg-plan-report s3_malware_protection
  tg-plan-report s3_malware_protection --verbose --targeted
  tg-plan-report s3_malware_protection --output my-custom-dir
  tg-plan-report report s3_malware_protection pr-plans-20250101-120000`,
  )
  .action(async (moduleName: string, options: PlanCliOptions) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand(moduleName, options);
  });

program
  .command('report')
  .description('Rebuild pr-ready.md from the raw plan files of an earlier run')
  .argument('<module>', 'Module name shown in the report headings')
  .argument('<dir>', 'Output directory of the earlier run')
  .action(async (moduleName: string, dir: string, _options: unknown, command: Command) => {
    const { reportCommand } = await import('./commands/report.js');
    const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
    await reportCommand(moduleName, dir, { verbose });
  });
