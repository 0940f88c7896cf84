/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { OutputFormat } from '../types/index.js';
import { formatElapsedTime } from './progress-indicator.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value, (_key, val: unknown) =>
      val instanceof Date ? val.toISOString() : val
    );
  }
  return String(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  if (columns) return columns;
  const first = data[0];
  return isRecord(first) ? Object.keys(first) : [];
}

function cell(row: unknown, column: string): unknown {
  return isRecord(row) ? row[column] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (!Array.isArray(data) || data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(
      col,
      Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length))
    );
  }
  const width = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));

  for (const row of data) {
    lines.push(
      detectedColumns.map((col) => valueToString(cell(row, col)).padEnd(width(col))).join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (!Array.isArray(data) || data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.join(','));

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const value = cell(row, col);
      if (value === null || value === undefined) {
        return '';
      }
      const str = valueToString(value);
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

/**
 * Compact summary for iteration runs in table format. Returns null for
 * anything that is not a run summary, or for other formats.
 */
function formatRunSummary(data: unknown, format: OutputFormat): string | null {
  if (format !== 'table' || !isRecord(data)) {
    return null;
  }
  if (!('runId' in data && Array.isArray(data.iterations) && Array.isArray(data.archiveFailures))) {
    return null;
  }

  const lines: string[] = [];
  lines.push('=== Simulation Run Summary ===');
  lines.push('');
  lines.push(`Run ID: ${valueToString(data.runId)}`);
  lines.push(`Status: ${valueToString(data.status)}`);
  lines.push(`Deck mode: ${valueToString(data.mode)}`);
  if (data.seed !== undefined) {
    lines.push(`Seed: ${valueToString(data.seed)}`);
  }
  lines.push(`Iterations: ${valueToString(data.succeeded)}/${valueToString(data.planned)} succeeded`);
  if (data.failedAt !== undefined) {
    lines.push(`Failed at: iteration ${valueToString(data.failedAt)}`);
    lines.push(`Reason: ${valueToString(data.haltReason)}`);
  }
  if (data.archiveFailures.length > 0) {
    lines.push(`Archive failures: ${data.archiveFailures.length}`);
  }
  if (typeof data.totalDurationMs === 'number') {
    lines.push(`Duration: ${formatElapsedTime(data.totalDurationMs)}`);
  }
  lines.push('');

  const rows = data.iterations.map((iteration: unknown) => {
    const run = cell(iteration, 'run');
    const archive = cell(iteration, 'archive');
    return {
      iteration: cell(iteration, 'label'),
      status: cell(iteration, 'status'),
      runMs: cell(run, 'durationMs'),
      snapshots: cell(run, 'snapshots'),
      archive: cell(archive, 'archiveName') ?? cell(iteration, 'errorMessage'),
    };
  });
  lines.push(formatTable(rows));

  return lines.join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  const summary = formatRunSummary(data, format);
  if (summary !== null) {
    return summary;
  }

  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (typeof data === 'object' && data !== null) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
