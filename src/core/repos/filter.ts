import type { RepoRef } from '../../types/index.js'
import { PreconditionError } from '../errors.js'

export interface RepoFilter {
  /** Pattern a repository name must match at its start; empty matches all */
  include?: string
  /** Pattern that drops a repository when it matches at its start; empty matches none */
  exclude?: string
}

function compile(pattern: string, option: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})`)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new PreconditionError(`Invalid ${option} pattern '${pattern}': ${reason}`)
  }
}

/**
 * Keep repositories whose name matches include and does not match exclude
 */
export function matchRepos(repos: readonly RepoRef[], filter: RepoFilter = {}): RepoRef[] {
  const include = filter.include ? compile(filter.include, 'include') : undefined
  const exclude = filter.exclude ? compile(filter.exclude, 'exclude') : undefined

  return repos.filter(repo => {
    const included = include ? include.test(repo.name) : true
    const excluded = exclude ? exclude.test(repo.name) : false
    return included && !excluded
  })
}
