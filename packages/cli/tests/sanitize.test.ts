import { describe, it, expect } from 'vitest'
import { sanitizeError } from '../src/utils/sanitize.js'

describe('sanitizeError', () => {
  it('replaces the home directory with ~', () => {
    const error = new Error("Input file '/home/ada/survey/export.csv' not found. Please check the file path.")

    expect(sanitizeError(error, '/home/ada')).toBe(
      "Input file '~/survey/export.csv' not found. Please check the file path."
    )
  })

  it('replaces every occurrence', () => {
    expect(sanitizeError('/home/ada/a and /home/ada/b', '/home/ada')).toBe('~/a and ~/b')
  })

  it('leaves messages alone when home is the root', () => {
    expect(sanitizeError(new Error('/etc/config.json'), '/')).toBe('/etc/config.json')
  })

  it('escapes regex characters in the home path', () => {
    expect(sanitizeError('C:\\Users\\a.b\\x and C:\\Users\\aXb', 'C:\\Users\\a.b')).toBe(
      '~\\x and C:\\Users\\aXb'
    )
  })

  it('handles values that are not errors', () => {
    expect(sanitizeError(undefined, '/home/ada')).toBe('Unknown error')
  })
})
