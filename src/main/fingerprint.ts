import crypto from 'crypto';
import { createReadStream } from 'fs';

export const DEFAULT_HASH_CHUNK_SIZE = 64 * 1024;

/**
 * Streams the file through SHA-256 in `chunkSize` pieces so memory stays flat
 * regardless of file size.
 */
export const computeContentHash = (
  filePath: string,
  chunkSize: number = DEFAULT_HASH_CHUNK_SIZE,
): Promise<string> =>
  new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });
    stream.on('data', (chunk) => hash.update(chunk));
    stream.once('error', reject);
    stream.once('end', () => resolve(hash.digest('hex')));
  });
