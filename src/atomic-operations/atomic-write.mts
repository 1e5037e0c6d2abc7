// @author lockerdb contributors
// @date 2026-10-19
import type { FileSystem } from '../file/file.mjs';

export const STAGING_SUFFIX = '.tmp';

/**
 * Replaces `filePath` with `data` by writing a staging file beside it and renaming it over the target.
 * A failure before the rename leaves the previous contents in place. The staging file is then removed
 * and the original error rethrown; if the removal fails too, both errors surface as an AggregateError.
 */
export async function writeFileAtomic(
  files: FileSystem,
  filePath: string,
  data: Buffer | string,
  mode: number,
): Promise<void> {
  const stagingPath = `${filePath}${STAGING_SUFFIX}`;
  try {
    await files.writeFile(stagingPath, data, mode);
    await files.rename(stagingPath, filePath);
  } catch (error) {
    if (await files.exists(stagingPath)) {
      await files.remove(stagingPath).catch((cleanupError: unknown) => {
        throw new AggregateError([error, cleanupError], `Failed to write ${filePath} and to clean up ${stagingPath}`);
      });
    }
    throw error;
  }
}
