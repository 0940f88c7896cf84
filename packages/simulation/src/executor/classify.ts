/**
 * Run classification
 *
 * The only place that knows how a finished run is recognized. The binary
 * can exit 0 after writing a partial log, so the exit code plays no part.
 */

import type { RunStatus } from '@cloverrun/core';
import { COMPLETION_MARKER } from '../layout.js';

export interface RunClassification {
  status: RunStatus;
  reason?: string;
}

export function classifyRun(
  logContents: string | null,
  marker: string = COMPLETION_MARKER
): RunClassification {
  if (logContents === null) {
    return { status: 'failed', reason: 'log file was not written' };
  }
  if (logContents.includes(marker)) {
    return { status: 'success' };
  }
  return { status: 'failed', reason: `completion marker '${marker}' not found in log` };
}
