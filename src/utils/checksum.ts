/**
 * Content seals for plan artifacts. The executor refuses to write an artifact
 * whose content no longer matches the seal taken at planning time.
 */
import { createHash } from 'node:crypto';

const CHECKSUM_LENGTH = 16;

/** Leading hex digits of the content's sha256. */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').substring(0, CHECKSUM_LENGTH);
}

export function verifyChecksum(content: string, checksum: string): boolean {
  return checksum.length === CHECKSUM_LENGTH && computeChecksum(content) === checksum;
}
