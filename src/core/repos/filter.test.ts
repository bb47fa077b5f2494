import { describe, it, expect } from 'vitest'
import { parseAddress } from './address.js'
import { matchRepos } from './filter.js'
import { PreconditionError } from '../errors.js'

const repos = ['abc', 'axy', 'xyz'].map(name => parseAddress(`git@github.com:acme/${name}.git`))

describe('matchRepos', () => {
  it('should keep everything by default', () => {
    expect(matchRepos(repos)).toHaveLength(3)
  })

  it('should keep names matching include but not exclude', () => {
    const matched = matchRepos(repos, { include: '^a', exclude: '^ab' })

    expect(matched.map(r => r.name)).toEqual(['axy'])
  })

  it('should match patterns at the start of the name', () => {
    const matched = matchRepos(repos, { include: 'x' })

    expect(matched.map(r => r.name)).toEqual(['xyz'])
  })

  it('should treat empty patterns as not set', () => {
    expect(matchRepos(repos, { include: '', exclude: '' })).toHaveLength(3)
  })

  it('should match against the name, not the owner', () => {
    expect(matchRepos(repos, { include: 'acme' })).toEqual([])
  })

  it('should reject an invalid pattern', () => {
    expect(() => matchRepos(repos, { include: '(' })).toThrow(PreconditionError)
    expect(() => matchRepos(repos, { exclude: '[' })).toThrow(/Invalid exclude pattern/)
  })
})
