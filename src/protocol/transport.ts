/**
 * Line transport consumed by the dispatchers.
 *
 * `Connection` is the TCP implementation; tests drive the dispatchers with a
 * scripted one.
 */
export interface LineTransport {
  /** Writes one `\n`-terminated frame; resolves once it is flushed */
  writeLine(line: string): Promise<void>;
  /** Resolves with the next line, without its terminator */
  readLine(): Promise<string>;
}
