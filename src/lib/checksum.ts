import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import type { ContentDigest } from '../types/index.js';
import { UnreadableFileError } from './errors.js';
import { getLogger } from './logger.js';

export interface ContentHasher {
  hashFile(filePath: string): Promise<ContentDigest>;
}

/**
 * Calculate SHA256 checksum from a file path without buffering the whole file
 * @param filePath Absolute path to file
 * @returns Promise that resolves with hex-encoded checksum
 */
export async function calculateFileChecksum(filePath: string): Promise<ContentDigest> {
  const logger = getLogger();
  const hash = createHash('sha256');
  const stream = createReadStream(filePath);

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      const checksum = hash.digest('hex');
      logger.debug({ filePath, checksum }, 'File checksum calculated');
      resolve(checksum);
    });

    stream.on('error', (error) => {
      logger.debug({ filePath, error }, 'Error calculating file checksum');
      reject(new UnreadableFileError(filePath, error));
    });
  });
}

export const sha256Hasher: ContentHasher = {
  hashFile: calculateFileChecksum,
};
