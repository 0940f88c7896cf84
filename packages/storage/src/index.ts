/**
 * @cloverrun/storage
 *
 * Per-iteration output isolation: collecting a run's artifacts into its own
 * directory and archiving that directory.
 */

export {
  collectIteration,
  iterationDirName,
  type CollectIterationParams,
  type CollectedIteration,
} from './artifacts/iteration-collector.js';
export {
  DEFAULT_ARCHIVE_PREFIX,
  ARCHIVE_EXTENSION,
  ARCHIVE_TIMESTAMP_FORMAT,
  formatArchiveTimestamp,
  buildArchiveName,
  parseArchiveName,
  type ArchiveNameParts,
} from './artifacts/archive-naming.js';
export {
  IterationArchiver,
  type IterationArchiverOptions,
  type ArchiveIterationParams,
} from './artifacts/iteration-archiver.js';
export { moveFile } from './artifacts/move-file.js';
