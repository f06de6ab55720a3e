export type GroupKind = 'commercial' | 'restricted';

export const GROUP_KINDS: readonly GroupKind[] = ['commercial', 'restricted'];

export interface AccountClassProfile {
  kind: GroupKind;
  label: string;
  /** Raw artifact file name inside the output directory. */
  artifactFile: string;
  /** Written instead of executor output when the group has no targets. */
  sentinel: string;
  environmentPattern: RegExp;
  regionPattern: RegExp;
}

export const ACCOUNT_CLASSES: Record<GroupKind, AccountClassProfile> = {
  commercial: {
    kind: 'commercial',
    label: 'Commercial',
    artifactFile: 'commercial-plans.txt',
    sentinel: 'No commercial plans needed\n',
    environmentPattern: /\/organizations\/([^/]+)\//,
    regionPattern: /\/([a-z]{2}-[a-z]+-[0-9])\//,
  },
  restricted: {
    kind: 'restricted',
    label: 'GovCloud',
    artifactFile: 'govcloud-plans.txt',
    sentinel: 'No GovCloud plans needed\n',
    environmentPattern: /(govcloud-[^/]+)/,
    regionPattern: /(us-gov-[a-z]+-[0-9])/,
  },
};

export const REPORT_FILE = 'pr-ready.md';

export function isSentinel(content: string): boolean {
  return GROUP_KINDS.some((kind) => content.includes(ACCOUNT_CLASSES[kind].sentinel.trim()));
}
