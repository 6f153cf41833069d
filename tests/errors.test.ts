import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ConfigurationError, MissingIncomeDataError, NotFoundError, ValidationError } from '../src/errors'

describe('ValidationError', () => {
  it('joins issues into the message', () => {
    const err = new ValidationError('Invalid scenario', ['lifestyle: bad', 'familyTransitionYear: too big'])
    expect(err.message).toBe('Invalid scenario: lifestyle: bad; familyTransitionYear: too big')
    expect(err.issues).toHaveLength(2)
    expect(err.name).toBe('ValidationError')
  })

  it('formats zod issues with their path', () => {
    const result = z.object({ gpa: z.number().max(4) }).safeParse({ gpa: 5 })
    if (result.success) throw new Error('expected a parse failure')
    const err = ValidationError.fromZod('Invalid profile', result.error)
    expect(err.issues).toHaveLength(1)
    expect(err.issues[0].startsWith('gpa: ')).toBe(true)
  })
})

describe('domain errors', () => {
  it('carry the offending identifier', () => {
    expect(new ConfigurationError('No tax brackets for Germany/income', 'Germany').jurisdiction).toBe('Germany')
    expect(new NotFoundError('Program', 42).message).toBe("Program '42' not found")
    expect(new MissingIncomeDataError('root').entityId).toBe('root')
  })

  it('are Error instances', () => {
    expect(new NotFoundError('Career node', 'x')).toBeInstanceOf(Error)
  })
})
