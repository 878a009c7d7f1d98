/**
 * Human-readable numbers for reports.
 */

const GNU_SUFFIXES = ['K', 'M', 'G', 'T', 'P', 'E', 'Z', 'Y'];
const BINARY_BASE = 1024;

const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Byte count in GNU `ls -h` style with binary units: `512B`, `1.5K`, `10.0M`.
 * Values under 1K are truncated to whole bytes.
 */
export function naturalSize(bytes: number): string {
  const abs = Math.abs(bytes);
  if (abs < BINARY_BASE) {
    return `${Math.trunc(bytes)}B`;
  }

  let scaled = bytes / BINARY_BASE;
  let unit = 0;
  while (Math.abs(scaled) >= BINARY_BASE && unit < GNU_SUFFIXES.length - 1) {
    scaled /= BINARY_BASE;
    unit += 1;
  }

  return `${scaled.toFixed(1)}${GNU_SUFFIXES[unit] ?? ''}`;
}

/**
 * Count with thousands separators: `1234567` → `1,234,567`
 */
export function intComma(value: number): string {
  return countFormat.format(value);
}

/**
 * Two-decimal percentage, whole values keeping one decimal: `77.78%`, `100.0%`.
 * Zero is `0%`.
 */
export function percent(value: number): string {
  if (value === 0) return '0%';
  return `${Number.isInteger(value) ? value.toFixed(1) : String(value)}%`;
}
