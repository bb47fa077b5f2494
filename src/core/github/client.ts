import { Octokit } from '@octokit/rest'
import type { RepoRef } from '../../types/index.js'
import { PreconditionError } from '../errors.js'

/**
 * Environment variables checked, in order, for the API token
 */
export const TOKEN_ENV_VARS = ['GH_TOKEN_PSW', 'GITHUB_TOKEN'] as const

/**
 * A repository as returned by a GitHub listing
 */
export interface RepoListing {
  fullName: string
  sshAddress: string
}

/**
 * Which repositories to list
 */
export type RepoScope = { kind: 'user' } | { kind: 'org'; org: string }

/**
 * Lists the remote branches of a repository
 */
export interface BranchLister {
  listBranches(repo: RepoRef): Promise<string[]>
}

/**
 * GitHub operations the scan needs
 */
export interface GitHubGateway extends BranchLister {
  listRepos(scope: RepoScope): Promise<RepoListing[]>
}

export interface GitHubClientOptions {
  token: string
  /** Defaults to https://api.github.com */
  baseUrl?: string
  /** Replacement for the global fetch */
  fetch?: typeof fetch
}

/**
 * Read the API token from the environment
 */
export function resolveToken(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of TOKEN_ENV_VARS) {
    const value = env[name]
    if (value) {
      return value
    }
  }
  throw new PreconditionError(
    `${TOKEN_ENV_VARS.join(' or ')} environment variable must be set to a GitHub token`
  )
}

/**
 * GitHub REST client used to list repositories and branches
 */
export class GitHubClient implements GitHubGateway {
  private readonly octokit: Octokit

  constructor(options: GitHubClientOptions) {
    this.octokit = new Octokit({
      auth: options.token,
      userAgent: 'leakfan',
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {})
    })
  }

  /**
   * Names of every branch, in the order the API returns them
   */
  async listBranches(repo: RepoRef): Promise<string[]> {
    const branches = await this.octokit.paginate(this.octokit.rest.repos.listBranches, {
      owner: repo.owner,
      repo: repo.name,
      per_page: 100
    })
    return branches.map(branch => branch.name)
  }

  /**
   * Every repository of the authenticated user or of an organisation
   */
  async listRepos(scope: RepoScope): Promise<RepoListing[]> {
    if (scope.kind === 'org') {
      const repos = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
        org: scope.org,
        per_page: 100
      })
      return repos.map(toListing)
    }

    const repos = await this.octokit.paginate(this.octokit.rest.repos.listForAuthenticatedUser, {
      per_page: 100
    })
    return repos.map(toListing)
  }
}

function toListing(repo: { full_name: string; ssh_url?: string }): RepoListing {
  return {
    fullName: repo.full_name,
    sshAddress: repo.ssh_url ?? `git@github.com:${repo.full_name}.git`
  }
}
