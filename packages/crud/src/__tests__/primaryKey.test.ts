import { InvalidArgumentError } from '../errors'
import { formatPrimaryKey, isPrimaryKey, keysToWhere, keyToWhere, normalizeKeyFields } from '../primaryKey'

describe('primary keys', () => {
  describe('formatPrimaryKey', () => {
    it('renders atomic keys verbatim', () => {
      expect(formatPrimaryKey(7)).toBe('7')
      expect(formatPrimaryKey('a1b2')).toBe('a1b2')
    })

    it('joins composite keys with a pipe', () => {
      expect(formatPrimaryKey([1, 'b', 3])).toBe('1|b|3')
      expect(formatPrimaryKey({ orgId: 1, userId: 'u-2' })).toBe('orgId:1|userId:u-2')
    })

    it('rejects anything else', () => {
      const unrecognized = new InvalidArgumentError('Unrecognized primary key type.')
      expect(() => formatPrimaryKey(null)).toThrow(unrecognized)
      expect(() => formatPrimaryKey(true)).toThrow(unrecognized)
      expect(() => formatPrimaryKey([1, { nested: 2 }])).toThrow(unrecognized)
      expect(() => formatPrimaryKey({ id: new Date(0) })).toThrow(unrecognized)
    })
  })

  it('recognizes key shapes at runtime', () => {
    expect(isPrimaryKey(1)).toBe(true)
    expect(isPrimaryKey(['a', 2])).toBe(true)
    expect(isPrimaryKey({ a: 1 })).toBe(true)
    expect(isPrimaryKey(undefined)).toBe(false)
    expect(isPrimaryKey(new Map())).toBe(false)
  })

  it('defaults key fields to id', () => {
    expect(normalizeKeyFields(undefined)).toEqual(['id'])
    expect(normalizeKeyFields('uuid')).toEqual(['uuid'])
    expect(() => normalizeKeyFields([])).toThrow('At least one primary key field is required.')
  })

  describe('keyToWhere', () => {
    const fields = ['orgId', 'userId']

    it('matches tuples by position and mappings by name', () => {
      expect(keyToWhere(5, ['id'])).toEqual({ id: 5 })
      expect(keyToWhere([1, 2], fields)).toEqual({ orgId: 1, userId: 2 })
      expect(keyToWhere({ userId: 2, orgId: 1, extra: 3 }, fields)).toEqual({ orgId: 1, userId: 2 })
    })

    it('rejects keys that do not fit the fields', () => {
      expect(() => keyToWhere(5, fields)).toThrow('Expected a composite key with 2 parts, got 5.')
      expect(() => keyToWhere([1], fields)).toThrow('Expected 2 key parts, got 1.')
      expect(() => keyToWhere({ orgId: 1 }, fields)).toThrow('Missing key part "userId" in orgId:1.')
    })
  })

  it('builds filters for several keys', () => {
    expect(keysToWhere([1, 2], ['id'])).toEqual({ id: { $in: [1, 2] } })
    expect(keysToWhere([[1, 2]], ['orgId', 'userId'])).toEqual({ $or: [{ orgId: 1, userId: 2 }] })
  })
})
