import {
  ACTION_BLOCK_HEADER,
  PlanTextScanner,
  isBlockFooter,
  isBlockHeader,
  scanPlanOutput,
} from '../../src/core/plan-scanner.js';

const HEADER = ACTION_BLOCK_HEADER;
const FOOTER = 'Plan: 9 to add, 0 to change, 0 to destroy.';

function commercialPath(env: string, region: string): string {
  return `Running plan in /work/terragrunt_s3/organizations/${env}/${region}/s3/terragrunt.hcl`;
}

describe('isBlockHeader / isBlockFooter', () => {
  it('should recognise the header phrase anywhere in the line', () => {
    expect(isBlockHeader(`[staging] ${HEADER}`)).toBe(true);
    expect(isBlockHeader('Terraform will perform')).toBe(false);
  });

  it('should require "Plan:" together with a change count phrase', () => {
    expect(isBlockFooter(FOOTER)).toBe(true);
    expect(isBlockFooter('Plan: 0 to add, 1 to change, 0 to destroy.')).toBe(true);
    expect(isBlockFooter('Plan: 1 to destroy.')).toBe(true);
    expect(isBlockFooter('Plan: nothing')).toBe(false);
    expect(isBlockFooter('2 to add')).toBe(false);
  });
});

describe('PlanTextScanner (commercial)', () => {
  let scanner: PlanTextScanner;

  beforeEach(() => {
    scanner = PlanTextScanner.forKind('commercial');
  });

  it('should start with no context and outside any block', () => {
    expect(scanner.state).toEqual({
      environment: '',
      region: '',
      insideActionBlock: false,
      blockLines: [],
    });
  });

  it('should latch environment and region from the same marker line', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    expect(scanner.state.environment).toBe('staging');
    expect(scanner.state.region).toBe('eu-west-1');
  });

  it('should keep the latched environment until another marker overwrites it', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    scanner.feed('some unrelated output');
    expect(scanner.state.environment).toBe('staging');

    scanner.feed(commercialPath('production', 'us-east-1'));
    expect(scanner.state.environment).toBe('production');
    expect(scanner.state.region).toBe('us-east-1');
  });

  it('should seed the block with the header line only once', () => {
    scanner.feed(HEADER);
    expect(scanner.state.insideActionBlock).toBe(true);
    expect(scanner.state.blockLines).toEqual([HEADER]);
  });

  it('should ignore lines outside a block, including a stray footer', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    expect(scanner.feed('  + resource "aws_s3_bucket" "this" {')).toBeUndefined();
    expect(scanner.feed(FOOTER)).toBeUndefined();
    expect(scanner.state.blockLines).toEqual([]);
  });

  it('should emit a record when the footer closes a block with full context', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    scanner.feed(HEADER);
    scanner.feed('  # aws_s3_bucket.this will be created');
    const record = scanner.feed(FOOTER);

    expect(record).toEqual({
      environment: 'staging',
      region: 'eu-west-1',
      blockText: [HEADER, '  # aws_s3_bucket.this will be created', FOOTER].join('\n'),
    });
    expect(scanner.state.insideActionBlock).toBe(false);
    expect(scanner.state.blockLines).toEqual([]);
  });

  it('should drop a block when the region is unset and keep the environment latched', () => {
    scanner.feed('Planning /organizations/staging/ (all regions)');
    scanner.feed(HEADER);
    const record = scanner.feed(FOOTER);

    expect(record).toBeUndefined();
    expect(scanner.state).toEqual({
      environment: 'staging',
      region: '',
      insideActionBlock: false,
      blockLines: [],
    });
  });

  it('should append a second header to the open block instead of restarting it', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    scanner.feed(HEADER);
    scanner.feed('  # first');
    scanner.feed(HEADER);
    scanner.feed('  # second');
    const record = scanner.feed(FOOTER);

    expect(record?.blockText).toBe([HEADER, '  # first', HEADER, '  # second', FOOTER].join('\n'));
  });

  it('should update context from marker lines inside a block', () => {
    scanner.feed(commercialPath('staging', 'eu-west-1'));
    scanner.feed(HEADER);
    scanner.feed(commercialPath('production', 'us-east-1'));
    const record = scanner.feed(FOOTER);

    expect(record?.environment).toBe('production');
    expect(record?.region).toBe('us-east-1');
  });
});

describe('scanPlanOutput', () => {
  it('should extract the documented staging/eu-west-1 example', () => {
    const block = [
      HEADER,
      '  # aws_s3_bucket.this will be created',
      '  + resource "aws_s3_bucket" "this" {',
      '    }',
      FOOTER,
    ].join('\n');
    const text = [
      commercialPath('staging', 'eu-west-1'),
      'Initializing the backend...',
      block,
      '',
    ].join('\n');

    expect(scanPlanOutput(text, 'commercial')).toEqual([
      { environment: 'staging', region: 'eu-west-1', blockText: block },
    ]);
  });

  it('should reuse latched context for consecutive blocks', () => {
    const text = [
      commercialPath('staging', 'eu-west-1'),
      HEADER,
      'Plan: 1 to add, 0 to change, 0 to destroy.',
      HEADER,
      'Plan: 0 to add, 2 to change, 0 to destroy.',
    ].join('\n');

    const records = scanPlanOutput(text, 'commercial');
    expect(records.map((r) => [r.environment, r.region])).toEqual([
      ['staging', 'eu-west-1'],
      ['staging', 'eu-west-1'],
    ]);
    expect(records[1].blockText).toBe(`${HEADER}\nPlan: 0 to add, 2 to change, 0 to destroy.`);
  });

  it('should return no records for empty or sentinel text', () => {
    expect(scanPlanOutput('', 'commercial')).toEqual([]);
    expect(scanPlanOutput('No commercial plans needed\n', 'commercial')).toEqual([]);
    expect(scanPlanOutput('No GovCloud plans needed\n', 'restricted')).toEqual([]);
  });

  it('should drop an unterminated block', () => {
    const text = [commercialPath('staging', 'eu-west-1'), HEADER, '  # never closed'].join('\n');
    expect(scanPlanOutput(text, 'commercial')).toEqual([]);
  });

  it('should use the GovCloud markers for restricted output', () => {
    const text = [
      'Running plan in /work/organizations/govcloud-production/us-gov-west-1/s3',
      HEADER,
      FOOTER,
    ].join('\n');

    expect(scanPlanOutput(text, 'restricted')).toEqual([
      {
        environment: 'govcloud-production',
        region: 'us-gov-west-1',
        blockText: `${HEADER}\n${FOOTER}`,
      },
    ]);
  });

  it('should not pick up GovCloud markers with the commercial patterns', () => {
    const text = ['govcloud-staging us-gov-west-1', HEADER, FOOTER].join('\n');
    expect(scanPlanOutput(text, 'commercial')).toEqual([]);
  });

  it('should yield the same records for the same input', () => {
    const text = [commercialPath('dev', 'us-west-2'), HEADER, FOOTER].join('\n');
    expect(scanPlanOutput(text, 'commercial')).toEqual(scanPlanOutput(text, 'commercial'));
  });
});
