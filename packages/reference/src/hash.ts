import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * SHA-256 hex digest of a file, read as a stream
 */
export async function fileSha256(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
