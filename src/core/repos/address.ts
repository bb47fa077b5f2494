import type { RepoRef } from '../../types/index.js'

/**
 * Derive a repository reference from a clone address
 *
 * Works for SSH (`git@github.com:owner/name.git`) and HTTPS
 * (`https://github.com/owner/name.git`) addresses: the address is split on
 * `:` and `/`, the last segment is the name (minus `.git`) and the one before
 * it the owner.
 */
export function parseAddress(address: string): RepoRef {
  const segments = address.split(/[:/]/).filter(segment => segment.length > 0)
  const name = (segments.at(-1) ?? '').replace(/\.git$/, '')
  const owner = segments.at(-2) ?? ''

  return Object.freeze({
    address,
    owner,
    name,
    fullName: `${owner}/${name}`
  })
}

/**
 * Parse a list of addresses, keeping input order
 */
export function parseAddresses(addresses: readonly string[]): RepoRef[] {
  return addresses.map(parseAddress)
}
