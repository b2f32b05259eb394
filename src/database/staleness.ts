import { StalenessPolicy } from '../types';
import { FileManager } from '../utils/FileManager';

/**
 * Missing files and files below the size floor are stale, otherwise age decides
 */
export async function isStale(
  fileManager: FileManager,
  filePath: string,
  policy: StalenessPolicy,
  now: number = Date.now(),
): Promise<boolean> {
  const modifiedAt = await fileManager.getModifiedTime(filePath);
  if (modifiedAt === undefined) return true;

  const size = await fileManager.getFileSize(filePath);
  if (size < policy.minBytes) return true;

  return now - modifiedAt > policy.maxAgeMs;
}
