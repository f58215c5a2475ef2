import type { ZodIssue } from 'zod'

export const formatZodIssue = (issue: ZodIssue | undefined, subject: string) => {
  const message = issue?.message ?? 'Unknown error'
  const path = issue?.path.length ? issue.path.join('.') : ''
  return path ? `Invalid ${subject} at ${path}: ${message}` : `Invalid ${subject}: ${message}`
}
