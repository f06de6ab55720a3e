import { ACCOUNT_CLASSES } from './account-class.js';
import type { GroupKind } from './account-class.js';

export const ACTION_BLOCK_HEADER = 'Terraform will perform the following actions:';

const SUMMARY_PHRASE = 'Plan:';
const CHANGE_COUNT_PHRASES = ['to add', 'to change', 'to destroy'] as const;

export interface ActionRecord {
  environment: string;
  region: string;
  blockText: string;
}

export interface ScannerPatterns {
  environment: RegExp;
  region: RegExp;
}

export interface ScannerState {
  environment: string;
  region: string;
  insideActionBlock: boolean;
  blockLines: readonly string[];
}

export function patternsFor(kind: GroupKind): ScannerPatterns {
  const profile = ACCOUNT_CLASSES[kind];
  return { environment: profile.environmentPattern, region: profile.regionPattern };
}

export function isBlockHeader(line: string): boolean {
  return line.includes(ACTION_BLOCK_HEADER);
}

export function isBlockFooter(line: string): boolean {
  return (
    line.includes(SUMMARY_PHRASE) && CHANGE_COUNT_PHRASES.some((phrase) => line.includes(phrase))
  );
}

/**
 * Line-at-a-time state machine extracting action blocks from plan output.
 *
 * Environment and region are latched from the most recent marker line and
 * survive across blocks. A block opens on the header line and closes on the
 * `Plan: ...` summary; it is emitted only when both latches are set, and is
 * otherwise dropped without error. A second header inside an open block is
 * appended like any other line.
 */
export class PlanTextScanner {
  private readonly patterns: ScannerPatterns;
  private environment = '';
  private region = '';
  private insideActionBlock = false;
  private blockLines: string[] = [];

  constructor(patterns: ScannerPatterns) {
    this.patterns = patterns;
  }

  static forKind(kind: GroupKind): PlanTextScanner {
    return new PlanTextScanner(patternsFor(kind));
  }

  get state(): ScannerState {
    return {
      environment: this.environment,
      region: this.region,
      insideActionBlock: this.insideActionBlock,
      blockLines: [...this.blockLines],
    };
  }

  /** Feed one line; returns the record completed by this line, if any. */
  feed(line: string): ActionRecord | undefined {
    this.latchEnvironment(line);
    this.latchRegion(line);

    if (!this.insideActionBlock && isBlockHeader(line)) {
      this.openBlock(line);
      return undefined;
    }

    if (!this.insideActionBlock) {
      return undefined;
    }

    this.blockLines.push(line);
    return isBlockFooter(line) ? this.closeBlock() : undefined;
  }

  scan(text: string): ActionRecord[] {
    const records: ActionRecord[] = [];
    for (const line of text.split('\n')) {
      const record = this.feed(line);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private latchEnvironment(line: string): void {
    const match = this.patterns.environment.exec(line);
    if (match?.[1]) {
      this.environment = match[1];
    }
  }

  private latchRegion(line: string): void {
    const match = this.patterns.region.exec(line);
    if (match?.[1]) {
      this.region = match[1];
    }
  }

  private openBlock(line: string): void {
    this.insideActionBlock = true;
    this.blockLines = [line];
  }

  private closeBlock(): ActionRecord | undefined {
    const blockText = this.blockLines.join('\n');
    this.insideActionBlock = false;
    this.blockLines = [];

    if (!this.environment || !this.region) {
      return undefined;
    }
    return { environment: this.environment, region: this.region, blockText };
  }
}

/** Scan one group's captured output with a fresh scanner. */
export function scanPlanOutput(text: string, kind: GroupKind): ActionRecord[] {
  return PlanTextScanner.forKind(kind).scan(text);
}
