import { createHash } from 'crypto'

/**
 * SHA-256 of a UTF-8 string as lowercase hex
 */
export function sha256Hex(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex')
}
