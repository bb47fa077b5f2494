import { createHash } from 'crypto'

/**
 * Calculate SHA-256 hash of a string
 */
export function hashString(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Leading hex digits of the SHA-256 hash, for use in file names
 */
export function shortHash(content: string, length = 12): string {
  return hashString(content).slice(0, length)
}
