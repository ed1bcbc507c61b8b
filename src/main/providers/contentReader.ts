import fs from 'fs/promises';
import mime from 'mime-types';
import type { FileRecord } from '../../common/fileTypes';

const TEXT_LIKE_TYPES = new Set([
  'application/json',
  'application/xml',
  'application/javascript',
  'application/x-sh',
  'application/x-yaml',
  'application/yaml',
  'application/toml',
  'application/x-tex',
  'application/rtf',
]);

export const isTextLike = (mimeType: string | null) =>
  Boolean(mimeType && (mimeType.startsWith('text/') || TEXT_LIKE_TYPES.has(mimeType)));

export type ContentReader = (record: FileRecord) => Promise<string>;

/** Reads up to `maxBytes` of text-like files; everything else yields ''. */
export const createContentReader =
  (maxBytes: number): ContentReader =>
  async (record) => {
    const mimeType = record.mimeType ?? (mime.lookup(record.path) || null);
    if (!isTextLike(mimeType) || record.size === 0) {
      return '';
    }
    const handle = await fs.open(record.path, 'r');
    try {
      const buffer = Buffer.alloc(Math.min(maxBytes, record.size));
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      // When the read stops short of the end, streaming mode holds back a
      // trailing character cut in half instead of emitting U+FFFD.
      const truncated = bytesRead < record.size;
      return new TextDecoder('utf-8').decode(buffer.subarray(0, bytesRead), { stream: truncated });
    } finally {
      await handle.close();
    }
  };
