import { parseBooleanToken } from '../boolean'

describe('parseBooleanToken', () => {
  it('accepts common truthy tokens', () => {
    expect(parseBooleanToken('true')).toBe(true)
    expect(parseBooleanToken(' YES ')).toBe(true)
    expect(parseBooleanToken('1')).toBe(true)
    expect(parseBooleanToken(1)).toBe(true)
  })

  it('accepts common falsy tokens', () => {
    expect(parseBooleanToken('off')).toBe(false)
    expect(parseBooleanToken('0')).toBe(false)
    expect(parseBooleanToken(false)).toBe(false)
  })

  it('returns null for anything else', () => {
    expect(parseBooleanToken('crud')).toBeNull()
    expect(parseBooleanToken(2)).toBeNull()
    expect(parseBooleanToken(undefined)).toBeNull()
  })
})
