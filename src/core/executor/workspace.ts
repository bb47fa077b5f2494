import { mkdir } from 'fs/promises'
import { join } from 'path'
import type { RepoRef, ScanDirectories, ScanResultKey } from '../../types/index.js'
import { shortHash } from '../../utils/hash.js'

/**
 * Create the scans, clones and reports directories under `baseDir`
 */
export async function createDirectories(baseDir: string): Promise<ScanDirectories> {
  const scans = join(baseDir, 'scans')
  const dirs: ScanDirectories = {
    scans,
    clones: join(scans, 'clones'),
    reports: join(scans, 'reports')
  }

  for (const dir of Object.values(dirs)) {
    await mkdir(dir, { recursive: true })
  }

  return dirs
}

/**
 * Clone location of a repository; scoped by owner so same-named repos never share it
 */
export function cloneDirFor(dirs: ScanDirectories, repo: RepoRef): string {
  return join(dirs.clones, repo.owner, repo.name)
}

/**
 * Report file names for the repositories of one run
 *
 * The plain name is `<name>-<branch>.json`, or `<owner>--<name>-<branch>.json`
 * when another repository of the run has the same name. A `~<hash>` of
 * `owner/name:branch` is added when the plain name could be produced by
 * another (repository, branch) pair:
 * - the branch contained `/`, which is flattened to `_`
 * - another stem of the run equals this one or starts with `<stem>-`
 *
 * Git refuses `~` in branch names and GitHub in repository names, so plain
 * names never contain it.
 */
export class ReportNaming {
  private readonly stems = new Map<string, string>()
  private readonly ambiguous = new Set<string>()

  constructor(repos: readonly RepoRef[]) {
    const shared = findSharedNames(repos)
    for (const repo of repos) {
      this.stems.set(repo.fullName, shared.has(repo.name) ? `${repo.owner}--${repo.name}` : repo.name)
    }

    const entries = [...this.stems]
    for (const [fullName, stem] of entries) {
      const clash = entries.some(
        ([other, otherStem]) =>
          other !== fullName && (otherStem === stem || otherStem.startsWith(`${stem}-`))
      )
      if (clash) {
        this.ambiguous.add(fullName)
      }
    }
  }

  stemFor(repo: RepoRef): string {
    return this.stems.get(repo.fullName) ?? repo.name
  }

  needsHash(repo: RepoRef, branch: string): boolean {
    return this.ambiguous.has(repo.fullName) || /[\\/]/.test(branch)
  }
}

/**
 * Report file for one branch of a repository
 */
export function reportPathFor(
  dirs: ScanDirectories,
  repo: RepoRef,
  branch: string,
  naming: ReportNaming = new ReportNaming([repo])
): string {
  const flat = branch.replace(/[\\/]/g, '_')
  const suffix = naming.needsHash(repo, branch) ? `~${shortHash(resultKey(repo, branch))}` : ''
  return join(dirs.reports, `${naming.stemFor(repo)}-${flat}${suffix}.json`)
}

export function resultKey(repo: RepoRef, branch: string): ScanResultKey {
  return `${repo.fullName}:${branch}`
}

/**
 * Names carried by more than one repository
 */
export function findSharedNames(repos: readonly RepoRef[]): Set<string> {
  const seen = new Map<string, Set<string>>()
  for (const repo of repos) {
    const owners = seen.get(repo.name) ?? new Set<string>()
    owners.add(repo.owner)
    seen.set(repo.name, owners)
  }
  return new Set([...seen].filter(([, owners]) => owners.size > 1).map(([name]) => name))
}
