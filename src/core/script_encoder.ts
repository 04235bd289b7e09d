/**
 * Builds the single-line compile expression the Pharo runtime evaluates to
 * install a method:
 *
 *   Calculator compile: ('sum: a with: b', Character cr asString, '    ^ a + b')
 *
 * Pharo string literals escape a quote by doubling it and have no other
 * escape mechanism, so each source line becomes one literal and the line
 * breaks are rebuilt on the remote side with `Character cr asString`.
 */

export const LINE_SEPARATOR = ', Character cr asString, ';

// Every Unicode line terminator, CRLF counted once.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export function quoteLine(line: string): string {
  return `'${line.replace(/'/g, "''")}'`;
}

export function splitLines(code: string): string[] {
  const lines = code.split(LINE_BREAK);
  // A trailing terminator ends the last line, it does not open a new one
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Returns `''` for empty code so callers can treat it as a no-op.
 */
export function encodeCompileScript(className: string, code: string): string {
  if (!code) return '';
  const expression = splitLines(code).map(quoteLine).join(LINE_SEPARATOR);
  return `${className} compile: (${expression})`;
}

/**
 * Inverse of {@link encodeCompileScript}. Returns `undefined` when the
 * expression was not produced by the encoder.
 */
export function decodeCompileScript(script: string): { className: string; lines: string[] } | undefined {
  const m = script.match(/^(\S+) compile: \((.*)\)$/s);
  if (!m) return undefined;
  const [, className, body] = m;
  if (className === undefined || body === undefined) return undefined;

  const lines: string[] = [];
  let rest = body;
  for (;;) {
    const literal = rest.match(/^'((?:[^']|'')*)'/);
    if (!literal || literal[1] === undefined) return undefined;
    lines.push(literal[1].replace(/''/g, "'"));
    rest = rest.slice(literal[0].length);
    if (rest === '') return { className, lines };
    if (!rest.startsWith(LINE_SEPARATOR)) return undefined;
    rest = rest.slice(LINE_SEPARATOR.length);
  }
}
