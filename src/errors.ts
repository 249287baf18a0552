import type { ZodError } from 'zod'

export type InputIssue = {
  path: string
  message: string
}

export class InvalidInputError extends Error {
  issues: InputIssue[]

  constructor(issues: InputIssue[]) {
    super(issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; '))
    this.name = 'InvalidInputError'
    this.issues = issues
  }

  static fromZod(error: ZodError, label: string): InvalidInputError {
    return new InvalidInputError(
      error.issues.map(issue => ({
        path: [label, ...issue.path].filter(p => p !== '').join('.'),
        message: issue.message,
      })),
    )
  }
}
