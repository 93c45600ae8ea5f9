import { FastifyInstance } from 'fastify';
import JSONbig from 'json-bigint';

// Integers past 2^53 come back as their exact digit string
const bigJson = JSONbig({ storeAsString: true });

class InvalidJsonBodyError extends Error {
  readonly statusCode = 400;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  // json-bigint throws plain { name, message, at } objects
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Invalid JSON body';
}

/**
 * Replace Fastify's JSON parser so u64 fields keep every digit,
 * and an empty body parses as {}.
 */
export function registerJsonBodyParser(fastify: FastifyInstance): void {
  fastify.removeContentTypeParser('application/json');

  fastify.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (_request, body, done) => {
    if (body.trim() === '') {
      done(null, {});
      return;
    }

    let parsed: unknown;
    try {
      parsed = bigJson.parse(body);
    } catch (error) {
      done(new InvalidJsonBodyError(errorMessage(error)), undefined);
      return;
    }
    done(null, parsed);
  });
}
