/**
 * Error taxonomy.
 *
 * The engine raises these and never catches them; translating them into
 * user-facing responses is the caller's job.
 */

import type { ZodError } from 'zod'

/** The reference dataset lacks an entry for a jurisdiction the caller named. */
export class ConfigurationError extends Error {
  readonly jurisdiction: string

  constructor(message: string, jurisdiction: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.jurisdiction = jurisdiction
  }
}

/** Caller input failed validation; raised before any simulation work. */
export class ValidationError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ValidationError'
    this.issues = issues
  }

  static fromZod(message: string, err: ZodError): ValidationError {
    return new ValidationError(message, formatIssues(err))
  }
}

/** The requested entity id does not exist in the dataset. */
export class NotFoundError extends Error {
  readonly entity: string
  readonly id: string | number

  constructor(entity: string, id: string | number) {
    super(`${entity} '${id}' not found`)
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

/** A projection entity has no income data points and cannot be simulated. */
export class MissingIncomeDataError extends Error {
  readonly entityId: string | number

  constructor(entityId: string | number) {
    super(`Entity '${entityId}' has no income data for net worth calculation`)
    this.name = 'MissingIncomeDataError'
    this.entityId = entityId
  }
}

export function formatIssues(err: ZodError): string[] {
  return err.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
