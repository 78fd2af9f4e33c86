/**
 * Command framing.
 */

/** A command and its optional argument payload */
export interface Command<T = unknown> {
  name: string;
  /** Omitted arguments are sent as nothing at all, not as `null` */
  args?: T;
}

/**
 * Encodes a command as one `\n`-terminated line: `<name> <json>`.
 *
 * The separating space is always written, so argument-less commands end in a
 * trailing space.
 */
export function encodeCommand<T>(command: Command<T>): string {
  const json = command.args === undefined ? '' : JSON.stringify(command.args);
  return `${command.name} ${json}\n`;
}

/** Single-line form for logs */
export function describeCommand<T>(command: Command<T>): string {
  return encodeCommand(command).trim();
}
