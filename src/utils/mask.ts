/**
 * Masking utilities for command output written to the log
 */

/**
 * Mask a secret value, showing only a prefix
 */
export function maskSecret(
  value: string,
  options: { prefixLength?: number; suffixLength?: number; maskChar?: string } = {}
): string {
  const { prefixLength = 4, suffixLength = 4, maskChar = '*' } = options

  if (value.length <= prefixLength + suffixLength) {
    return maskChar.repeat(value.length)
  }

  const prefix = value.slice(0, prefixLength)
  const maskLength = Math.min(value.length - prefixLength - suffixLength, 8)

  return `${prefix}${maskChar.repeat(maskLength)}[MASKED]`
}

/**
 * Common secret patterns to mask
 */
export const SECRET_PATTERNS: readonly RegExp[] = [
  // AWS keys
  /AKIA[0-9A-Z]{16}/g,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  /github_pat_[a-zA-Z0-9_]{22,}/g,
  // Private keys
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  // "Secret"/"Match" fields as printed by gitleaks
  /("?(?:Secret|Match|Line)"?\s*[:=]\s*"?)([^"\n]+)/g
]

/**
 * Mask all secret patterns in a string
 */
export function maskSecrets(text: string, patterns: readonly RegExp[] = SECRET_PATTERNS): string {
  let result = text

  for (const pattern of patterns) {
    result = result.replace(pattern, (match: string, label?: string, value?: string) => {
      if (typeof label === 'string' && typeof value === 'string') {
        return label + maskSecret(value)
      }
      return maskSecret(match)
    })
  }

  return result
}

/**
 * Mask a token for display, e.g. when reporting which credential is in use
 */
export function maskToken(token: string): string {
  return maskSecret(token, { prefixLength: 4, suffixLength: 0 })
}
