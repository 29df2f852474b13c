/**
 * Memory quantity parsing
 *
 * Converts Kubernetes memory quantities ("512Mi", "1Gi", "100M") to whole MiB.
 * Only the leading integer and the letters right after it are read, so "1.5Gi"
 * is 1 MiB. Unparseable input yields FALLBACK_MEMORY_MIB rather than an error
 * so a malformed limit never blocks a remediation.
 */

export const FALLBACK_MEMORY_MIB = 256;

const UNIT_TO_MIB: ReadonlyMap<string, number> = new Map([
  ['Ki', 1 / 1024],
  ['Mi', 1],
  ['Gi', 1024],
  ['K', 1000 / 1024 ** 2],
  ['M', 1000 / 1024],
  ['G', 1000 ** 2 / 1024],
]);

const QUANTITY_PATTERN = /^(\d+)([a-zA-Z]*)/;

export function parseMemoryToMiB(quantity: string): number {
  const match = QUANTITY_PATTERN.exec(quantity);
  if (!match) {
    return FALLBACK_MEMORY_MIB;
  }

  const [, digits = '', unit = ''] = match;
  // Unknown suffixes (and none at all) are read as MiB
  const multiplier = UNIT_TO_MIB.get(unit) ?? 1;

  return Math.trunc(Number.parseInt(digits, 10) * multiplier);
}

export function formatMiB(mib: number): string {
  return `${mib}Mi`;
}
