import { matchesWhere } from '../matchWhere'

describe('matchesWhere', () => {
  const item = { id: 3, name: 'Anna', teamId: null, joined: new Date('2024-03-01T00:00:00Z') }

  it('matches everything without a filter', () => {
    expect(matchesWhere(item, undefined)).toBe(true)
    expect(matchesWhere(item, {})).toBe(true)
  })

  it('compares plain values for equality', () => {
    expect(matchesWhere(item, { name: 'Anna', id: 3 })).toBe(true)
    expect(matchesWhere(item, { name: 'Ann' })).toBe(false)
    expect(matchesWhere(item, { teamId: null })).toBe(true)
    expect(matchesWhere(item, { missing: null })).toBe(true)
    expect(matchesWhere(item, { joined: new Date('2024-03-01T00:00:00Z') })).toBe(true)
  })

  it('applies comparison operators', () => {
    expect(matchesWhere(item, { id: { $gt: 2, $lte: 3 } })).toBe(true)
    expect(matchesWhere(item, { id: { $lt: 3 } })).toBe(false)
    expect(matchesWhere(item, { id: { $ne: 4 } })).toBe(true)
    expect(matchesWhere(item, { name: { $gte: 'B' } })).toBe(false)
    expect(matchesWhere(item, { joined: { $lt: new Date('2025-01-01T00:00:00Z') } })).toBe(true)
  })

  it('applies list and presence operators', () => {
    expect(matchesWhere(item, { id: { $in: [1, 3] } })).toBe(true)
    expect(matchesWhere(item, { id: { $nin: [1, 3] } })).toBe(false)
    expect(matchesWhere(item, { teamId: { $exists: false } })).toBe(true)
    expect(matchesWhere(item, { name: { $exists: true } })).toBe(true)
  })

  it('translates like patterns', () => {
    expect(matchesWhere(item, { name: { $like: 'An%' } })).toBe(true)
    expect(matchesWhere(item, { name: { $like: 'A_na' } })).toBe(true)
    expect(matchesWhere(item, { name: { $like: 'A.na' } })).toBe(false)
  })

  it('combines clauses', () => {
    expect(matchesWhere(item, { $or: [{ id: 1 }, { name: 'Anna' }] })).toBe(true)
    expect(matchesWhere(item, { $and: [{ id: 3 }, { name: 'Bo' }] })).toBe(false)
    expect(matchesWhere(item, { $not: { id: 3 } })).toBe(false)
  })

  it('rejects unknown operators', () => {
    expect(() => matchesWhere(item, { id: { $between: [1, 2] } })).toThrow('Unsupported filter operator: $between')
  })
})
