import { copyFile, rename, unlink } from 'fs/promises';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Move a file, falling back to copy + unlink when source and destination
 * live on different filesystems.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    await copyFile(source, destination);
    await unlink(source);
  }
}
