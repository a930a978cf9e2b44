import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';

export type ErrorCode = 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'INTERNAL';

export type ErrorResponse = {
  error: { code: string; message: string };
};

export class AppError extends Error {
  constructor(
    readonly status: ContentfulStatusCode,
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

function errorBody(code: string, message: string): ErrorResponse {
  return { error: { code, message } };
}

function zodMessage(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function handleError(err: unknown, c: Context): Response {
  if (err instanceof AppError) {
    return c.json(errorBody(err.code, err.message), err.status);
  }
  if (err instanceof ZodError) {
    return c.json(errorBody('INVALID_ARGUMENT', zodMessage(err)), 400);
  }
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  // Details stay in the server log; clients get a generic message.
  console.error('request: unhandled error', err);
  return c.json(errorBody('INTERNAL', 'Internal Server Error'), 500);
}

export function handleNotFound(c: Context): Response {
  return c.json(errorBody('NOT_FOUND', 'Not Found'), 404);
}
