import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('../../src/ui/logger.js', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    header: vi.fn(),
    dim: vi.fn(),
    command: vi.fn(),
  })),
}));

import { reportCommand } from '../../src/commands/report.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('reportCommand', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'tg-plan-report-cmd-'));
    vi.spyOn(process, 'cwd').mockReturnValue(cwd);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it('should rebuild pr-ready.md from the raw artifacts without planning', async () => {
    await writeFile(
      join(cwd, 'commercial-plans.txt'),
      [
        '/organizations/production/us-east-1/',
        'Terraform will perform the following actions:',
        'Plan: 0 to add, 0 to change, 1 to destroy.',
      ].join('\n'),
    );
    await writeFile(join(cwd, 'govcloud-plans.txt'), 'No GovCloud plans needed\n');

    await reportCommand('s3', '.', {});

    const report = await readFile(join(cwd, 'pr-ready.md'), 'utf-8');
    expect(report).toBe(
      '**Terraform plan**\n\n' +
        '## [environment: production] - [command: kitman tg plan_all] - [module: s3]\n\n' +
        '<details>\n<summary>us-east-1</summary>\n\n```bash\n' +
        'Terraform will perform the following actions:\n' +
        'Plan: 0 to add, 0 to change, 1 to destroy.\n```\n\n</details>\n\n',
    );
  });

  it('should reject a missing output directory', async () => {
    await expect(reportCommand('s3', 'nope', {})).rejects.toBeInstanceOf(ValidationError);
  });
});
