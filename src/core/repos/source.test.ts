import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { loadRepos, parseRepoList, readRepoFile } from './source.js'
import { PreconditionError } from '../errors.js'
import type { GitHubGateway, RepoScope } from '../github/client.js'

describe('parseRepoList', () => {
  it('should trim lines and skip blanks and comments', () => {
    const content = '  git@github.com:acme/a.git \n\n# archived\ngit@github.com:acme/b.git\r\n'

    expect(parseRepoList(content)).toEqual([
      'git@github.com:acme/a.git',
      'git@github.com:acme/b.git'
    ])
  })
})

describe('readRepoFile', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'leakfan-source-test-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('should parse every address in the file', async () => {
    const path = join(tempDir, 'repos.txt')
    await writeFile(path, 'git@github.com:acme/a.git\ngit@github.com:other/b.git\n')

    const repos = await readRepoFile(path)

    expect(repos.map(r => r.fullName)).toEqual(['acme/a', 'other/b'])
  })

  it('should raise a precondition error for an unreadable file', async () => {
    const path = join(tempDir, 'missing.txt')

    await expect(readRepoFile(path)).rejects.toThrow(PreconditionError)
    await expect(readRepoFile(path)).rejects.toThrow(
      `The repos file '${path}' cannot be read (ENOENT)`
    )
  })
})

describe('loadRepos', () => {
  it('should turn GitHub listings into references', async () => {
    const scopes: RepoScope[] = []
    const github: GitHubGateway = {
      listBranches: async () => [],
      listRepos: async scope => {
        scopes.push(scope)
        return [{ fullName: 'acme/a', sshAddress: 'git@github.com:acme/a.git' }]
      }
    }

    const repos = await loadRepos({ kind: 'github', scope: { kind: 'org', org: 'acme' } }, github)

    expect(scopes).toEqual([{ kind: 'org', org: 'acme' }])
    expect(repos).toEqual([
      { address: 'git@github.com:acme/a.git', owner: 'acme', name: 'a', fullName: 'acme/a' }
    ])
  })
})
