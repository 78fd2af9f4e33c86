/**
 * Password exchange performed once per connection, before any command.
 */
import { AuthenticationError } from '../errors';
import type { LineTransport } from '../protocol/transport';
import type { Logger } from '../utils/logger';

/**
 * Sends the password and requires an `OK`-prefixed first reply.
 *
 * @throws AuthenticationError for any other reply, an empty one, or a
 *   transport failure during the exchange (kept as `cause`)
 */
export async function handshake(transport: LineTransport, password: string, logger?: Logger): Promise<void> {
  let reply: string;
  try {
    await transport.writeLine(`${password}\n`);
    reply = await transport.readLine();
  } catch (error) {
    logger?.debug('Handshake interrupted', error);
    throw new AuthenticationError('Handshake failed: connection error', undefined, error);
  }

  logger?.trace('Handshake reply', { reply });
  if (!reply.startsWith('OK')) {
    throw new AuthenticationError('Handshake failed: server rejected password', reply);
  }
  logger?.debug('Authenticated');
}
