/**
 * Payload decoding.
 */
import { ProtocolError } from '../errors';
import type { PayloadSchema } from './schemas';

/**
 * Parses the text after a response token and validates it.
 *
 * The wire sends a unit payload as nothing at all, so empty text is read as
 * `null`. Nothing else is relaxed.
 *
 * @throws ProtocolError when the text is not JSON or does not fit the schema
 */
export function decodePayload<T>(text: string, schema: PayloadSchema<T>): T {
  const source = text === '' ? 'null' : text;

  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (error) {
    throw new ProtocolError(text, error instanceof Error ? error.message : String(error), error);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const diagnostic = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ProtocolError(text, diagnostic, result.error);
  }
  return result.data;
}
