/**
 * Response line classification.
 *
 * Every response line is matched against one ordered prefix table. Lines
 * matching no entry are `UNRECOGNIZED`: the server occasionally prints stray
 * diagnostics (bare numbers) that carry no protocol meaning.
 */

export type ResponseKind = 'OK' | 'ERROR' | 'FINISHED' | 'FAILED' | 'NOTE';

/** Precedence order; first match wins */
export const RESPONSE_PREFIXES: readonly ResponseKind[] = ['OK', 'ERROR', 'FINISHED', 'FAILED', 'NOTE'];

export type ClassifiedLine =
  | { kind: ResponseKind; rest: string }
  | { kind: 'UNRECOGNIZED'; line: string };

export function classifyLine(line: string): ClassifiedLine {
  const trimmed = line.trim();
  for (const prefix of RESPONSE_PREFIXES) {
    if (trimmed.startsWith(prefix)) {
      return { kind: prefix, rest: trimmed.slice(prefix.length).trim() };
    }
  }
  return { kind: 'UNRECOGNIZED', line };
}
