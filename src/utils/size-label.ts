/**
 * Size labels name an input by its read count in millions: "0.1m", "10m"
 */

export const SIZE_LABEL_PATTERN = /^\d+(\.\d+)?m$/;

export function isSizeLabel(label: string): boolean {
  return SIZE_LABEL_PATTERN.test(label);
}

/**
 * Millions of reads encoded by a label
 */
export function sizeValue(label: string): number {
  return Number.parseFloat(label.slice(0, -1));
}

export function readsForSize(label: string): number {
  return Math.round(sizeValue(label) * 1_000_000);
}

export function compareSizeLabels(a: string, b: string): number {
  return sizeValue(a) - sizeValue(b);
}

/**
 * Split a comma- or space-separated list, dropping blanks and repeats
 */
export function parseSizeList(raw: string): string[] {
  const labels = raw
    .split(/[,\s]+/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
  return [...new Set(labels)];
}

export function sortSizeLabels(labels: Iterable<string>): string[] {
  return [...new Set(labels)].sort(compareSizeLabels);
}
