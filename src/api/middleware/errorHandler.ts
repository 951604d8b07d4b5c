import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  return new ApiError(message, statusCode, code);
}

export async function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const statusCode = error.statusCode || 500;
  const message = error.message || 'Internal Server Error';

  if (statusCode >= 500) {
    request.log.error(error, 'Request error');
  } else {
    request.log.warn({ code: error.code, message }, 'Request rejected');
  }

  reply.status(statusCode).send({
    error: {
      message,
      code: error.code || 'INTERNAL_ERROR',
      statusCode,
    },
  });
}
