/**
 * Free disk space probe for the filesystem holding the log file.
 */

import { statfs } from 'fs/promises';
import { dirname } from 'path';

/** Returns the bytes available to unprivileged users on the volume containing `path` */
export type DiskSpaceProbe = (path: string) => Promise<number>;

export const freeDiskSpace: DiskSpaceProbe = async (path) => {
  const stats = await statfs(dirname(path));
  return stats.bavail * stats.bsize;
};
