export interface PartitionedTargets {
  commercial: string[];
  restricted: string[];
}

/**
 * Split targets into the two account classes. A target is restricted iff its
 * identifier contains `restrictedMarker`; input order is kept in each list.
 */
export function partitionTargets(targets: readonly string[], restrictedMarker: string): PartitionedTargets {
  const result: PartitionedTargets = { commercial: [], restricted: [] };
  for (const target of targets) {
    if (target.includes(restrictedMarker)) {
      result.restricted.push(target);
    } else {
      result.commercial.push(target);
    }
  }
  return result;
}
