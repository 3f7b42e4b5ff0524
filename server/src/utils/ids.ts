import { NotFoundError } from '../errors/AppError.js';

const ID_PATTERN = /^[1-9]\d*$/;

/**
 * Parse a numeric route id. Anything that is not a positive integer cannot
 * name a row, so it is reported as not found rather than as a bad request.
 */
export function parseIdParam(raw: string, notFoundMessage: string): number {
  const id = Number(raw);
  if (!ID_PATTERN.test(raw) || !Number.isSafeInteger(id)) {
    throw new NotFoundError(notFoundMessage);
  }
  return id;
}
