import { readFile } from 'fs/promises'
import type { RepoRef } from '../../types/index.js'
import { PreconditionError } from '../errors.js'
import type { GitHubGateway, RepoScope } from '../github/client.js'
import { parseAddress, parseAddresses } from './address.js'

/**
 * Where the repository list comes from
 */
export type RepoSource =
  | { kind: 'file'; path: string }
  | { kind: 'github'; scope: RepoScope }

/**
 * Extract addresses from the contents of a repos file
 *
 * One address per line; blank lines and `#` comments are skipped.
 */
export function parseRepoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
}

/**
 * Read repositories from a newline-delimited file of addresses
 */
export async function readRepoFile(path: string): Promise<RepoRef[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code ?? 'UNKNOWN'
    throw new PreconditionError(`The repos file '${path}' cannot be read (${code})`)
  }
  return parseAddresses(parseRepoList(content))
}

/**
 * Load the repositories for a source
 */
export async function loadRepos(source: RepoSource, github: GitHubGateway): Promise<RepoRef[]> {
  switch (source.kind) {
    case 'file':
      return readRepoFile(source.path)
    case 'github': {
      const listings = await github.listRepos(source.scope)
      return listings.map(listing => parseAddress(listing.sshAddress))
    }
  }
}
