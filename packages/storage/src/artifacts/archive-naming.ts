/**
 * Archive names: <prefix>_<yyyyMMdd_HHmmss>_<NN>.tar.gz
 *
 * Second resolution only, so two iterations finishing in the same second
 * share a timestamp. The iteration index is always part of the name and
 * keeps them apart.
 */

import { DateTime } from 'luxon';
import { formatIterationIndex } from '@cloverrun/core';

export const DEFAULT_ARCHIVE_PREFIX = 'clover_data';
export const ARCHIVE_EXTENSION = '.tar.gz';
export const ARCHIVE_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

export interface ArchiveNameParts {
  timestampMs: number;
  iteration: number;
  /** Plan size; widens the index padding for large plans */
  total?: number;
  prefix?: string;
  /** IANA zone or 'utc'; local time by default */
  zone?: string;
}

export function formatArchiveTimestamp(timestampMs: number, zone: string = 'local'): string {
  return DateTime.fromMillis(timestampMs, { zone }).toFormat(ARCHIVE_TIMESTAMP_FORMAT);
}

export function buildArchiveName(parts: ArchiveNameParts): string {
  const prefix = parts.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  const timestamp = formatArchiveTimestamp(parts.timestampMs, parts.zone);
  const index = formatIterationIndex(parts.iteration, parts.total ?? parts.iteration);
  return `${prefix}_${timestamp}_${index}${ARCHIVE_EXTENSION}`;
}

const ARCHIVE_NAME_PATTERN = /^(.+)_(\d{8}_\d{6})_(\d{2,})\.tar\.gz$/;

/**
 * Split an archive name back into prefix, timestamp and iteration index
 */
export function parseArchiveName(
  name: string
): { prefix: string; timestamp: string; iteration: number } | null {
  const match = ARCHIVE_NAME_PATTERN.exec(name);
  if (!match) return null;
  const [, prefix, timestamp, index] = match;
  if (prefix === undefined || timestamp === undefined || index === undefined) return null;
  return { prefix, timestamp, iteration: Number(index) };
}
