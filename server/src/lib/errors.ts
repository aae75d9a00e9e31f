import type { ZodIssue } from "zod"

/**
 * Errors that carry an HTTP status. The error handler middleware turns these
 * into `{ error: { message } }` responses; anything else becomes a 500.
 */
export class HttpError extends Error {
  readonly statusCode: number

  constructor(statusCode: number, message: string) {
    super(message)
    this.name = "HttpError"
    this.statusCode = statusCode
  }
}

/** Caller supplied an invalid parameter. */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message)
    this.name = "ValidationError"
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message)
    this.name = "NotFoundError"
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = "Authentication required") {
    super(401, message)
    this.name = "AuthenticationError"
  }
}

/**
 * Turn zod issues into a ValidationError listing each failing field.
 */
export function validationErrorFromIssues(issues: ZodIssue[]): ValidationError {
  const message = issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
  return new ValidationError(message)
}
