/**
 * Usage Report Rendering
 *
 * Two output shapes: machine-readable JSON (every numeric field paired with a
 * `_human` string) and a humanized two-section table.
 */

import { config } from './config.js';
import { intComma, naturalSize, percent } from './humanize.js';
import type { DeletedStats, PresentStats, UsageStats } from './types.js';

type FieldKind = 'size' | 'count' | 'pct';

interface ReportField<K extends string> {
  key: K;
  name: string;
  kind: FieldKind;
}

type ReportRow = Record<string, number | string>;

export interface JsonReport {
  bucket: string;
  present: ReportRow;
  deleted: ReportRow;
}

// Table order; deleted rows have no latest_size or pct_used_by_latest
const PRESENT_FIELDS: ReportField<keyof PresentStats>[] = [
  { key: 'numFiles', name: 'num_files', kind: 'count' },
  { key: 'numVersions', name: 'num_versions', kind: 'count' },
  { key: 'averageSize', name: 'average_size', kind: 'size' },
  { key: 'latestSize', name: 'latest_size', kind: 'size' },
  { key: 'totalSize', name: 'total_size', kind: 'size' },
  { key: 'pctUsedByLatest', name: 'pct_used_by_latest', kind: 'pct' },
];

const DELETED_FIELDS: ReportField<keyof DeletedStats>[] = [
  { key: 'numFiles', name: 'num_files', kind: 'count' },
  { key: 'numVersions', name: 'num_versions', kind: 'count' },
  { key: 'averageSize', name: 'average_size', kind: 'size' },
  { key: 'totalSize', name: 'total_size', kind: 'size' },
];

export function humanizeValue(kind: FieldKind, value: number): string {
  switch (kind) {
    case 'size':
      return naturalSize(value);
    case 'count':
      return intComma(value);
    case 'pct':
      return percent(value);
  }
}

function buildRow<K extends string>(stats: Record<K, number>, fields: ReportField<K>[]): ReportRow {
  const row: ReportRow = {};
  for (const field of fields) {
    const value = stats[field.key];
    row[field.name] = value;
    row[`${field.name}_human`] = humanizeValue(field.kind, value);
  }
  return row;
}

function sortRow(row: ReportRow): ReportRow {
  return Object.fromEntries(Object.entries(row).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function buildJsonReport(stats: UsageStats, bucket: string): JsonReport {
  // Alphabetical at every level
  return {
    bucket,
    deleted: sortRow(buildRow(stats.deleted, DELETED_FIELDS)),
    present: sortRow(buildRow(stats.present, PRESENT_FIELDS)),
  };
}

export function formatJsonReport(stats: UsageStats, bucket: string): string {
  return JSON.stringify(buildJsonReport(stats, bucket), null, 2);
}

function formatLine(status: string, field: string, value: string): string {
  const { status: statusWidth, field: fieldWidth } = config.reportLineWidths;
  return `${status.padStart(statusWidth)}: ${field.padStart(fieldWidth)}: ${value}`;
}

export function formatHumanReport(stats: UsageStats): string {
  const lines: string[] = [''];

  for (const field of PRESENT_FIELDS) {
    lines.push(formatLine('Present', field.name, humanizeValue(field.kind, stats.present[field.key])));
  }

  lines.push('');

  for (const field of DELETED_FIELDS) {
    lines.push(formatLine('Deleted', field.name, humanizeValue(field.kind, stats.deleted[field.key])));
  }

  lines.push('');
  return lines.join('\n');
}
