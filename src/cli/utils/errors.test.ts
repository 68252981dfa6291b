import { describe, expect, it } from 'vitest'

import { ConflictError, InvalidInputError, NotFoundError } from '../../utils/errors'
import { CLIError, exitCodeFor, parseSeconds } from './errors'

describe('exitCodeFor', () => {
  it('uses 2 for invalid input and 1 for other failures', () => {
    expect(exitCodeFor(new InvalidInputError('name is required when not inside tmux', 'session'))).toBe(2)
    expect(exitCodeFor(new NotFoundError('missing', 'x'))).toBe(1)
    expect(exitCodeFor(new ConflictError('busy', 'x'))).toBe(1)
    expect(exitCodeFor(new Error('boom'))).toBe(1)
  })

  it('keeps the code of a CLIError', () => {
    expect(exitCodeFor(new CLIError('bad flag', 2))).toBe(2)
  })
})

describe('parseSeconds', () => {
  it('accepts non-negative numbers', () => {
    expect(parseSeconds('0')).toBe(0)
    expect(parseSeconds('2.5')).toBe(2.5)
  })

  it('rejects anything else', () => {
    expect(() => parseSeconds('-1')).toThrow('Invalid number of seconds: -1')
    expect(() => parseSeconds('soon')).toThrow(CLIError)
    expect(() => parseSeconds(' ')).toThrow(CLIError)
  })
})
