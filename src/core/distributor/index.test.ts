import { describe, it, expect } from 'vitest'
import { DEFAULT_MAX_WORKERS, offsetLabel, planAssignments } from './index.js'
import { parseAddress } from '../repos/address.js'
import { PreconditionError } from '../errors.js'

function makeRepos(count: number) {
  return Array.from({ length: count }, (_, i) => parseAddress(`git@github.com:acme/repo${i}.git`))
}

describe('planAssignments', () => {
  it('should cap workers at 35 by default', () => {
    expect(DEFAULT_MAX_WORKERS).toBe(35)
  })

  it('should use one worker per repository when repositories <= cap', () => {
    const repos = makeRepos(3)
    const plan = planAssignments(repos, 3)

    expect(plan.mode).toBe('direct')
    expect(plan.assignments).toHaveLength(3)
    expect(plan.assignments.map(a => a.label)).toEqual(['acme/repo0', 'acme/repo1', 'acme/repo2'])
  })

  it('should bind each direct worker to its repository', () => {
    const repos = makeRepos(2)
    const plan = planAssignments(repos, 35)

    expect(plan.assignments).toEqual([
      { kind: 'direct', repo: repos[0], label: 'acme/repo0' },
      { kind: 'direct', repo: repos[1], label: 'acme/repo1' }
    ])
  })

  it('should use a capped pool sharing a queue when repositories > cap', async () => {
    const repos = makeRepos(5)
    const plan = planAssignments(repos, 2)

    expect(plan.mode).toBe('queue')
    if (plan.mode !== 'queue') {
      return
    }
    expect(plan.assignments).toHaveLength(2)
    expect(plan.assignments.map(a => a.offset)).toEqual([0, 1])
    expect(plan.assignments.every(a => a.queue === plan.queue)).toBe(true)
    expect(plan.queue.size).toBe(5)
    expect(await plan.queue.tryGet(0)).toBe(repos[0])
  })

  it('should zero-pad offsets to the widest offset', () => {
    const plan = planAssignments(makeRepos(40), 35)

    expect(plan.assignments[0]?.label).toBe('00')
    expect(plan.assignments[34]?.label).toBe('34')
  })

  it('should fail fast on an empty repository set', () => {
    expect(() => planAssignments([], 35)).toThrow(PreconditionError)
    expect(() => planAssignments([], 35)).toThrow('No repositories to scan')
  })

  it('should reject a cap that is not a positive integer', () => {
    expect(() => planAssignments(makeRepos(1), 0)).toThrow(PreconditionError)
    expect(() => planAssignments(makeRepos(1), 1.5)).toThrow(PreconditionError)
  })

  it.each([
    [1, 1],
    [35, 35],
    [36, 35],
    [100, 35]
  ])('should create min(%i, cap) workers for %i repositories', (count, expected) => {
    expect(planAssignments(makeRepos(count), 35).assignments).toHaveLength(expected)
  })
})

describe('offsetLabel', () => {
  it('should not pad when the cap is below 11', () => {
    expect(offsetLabel(3, 10)).toBe('3')
  })

  it('should pad to three digits for a cap of 101', () => {
    expect(offsetLabel(7, 101)).toBe('007')
  })
})
