/**
 * Content digests for captured tool output
 */

import * as crypto from 'crypto';
import * as fs from 'fs';

export function sha256(data: Buffer | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Stream a file through sha256; null when the file does not exist
 */
export async function fileDigest(filePath: string): Promise<string | null> {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  const hash = crypto.createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
