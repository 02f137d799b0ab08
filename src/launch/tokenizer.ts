/**
 * Shell-like tokenizer for launch commands.
 *
 * Close to POSIX word splitting with one deliberate difference: a
 * backslash only escapes a quote character or whitespace, so Windows
 * paths such as `C:\Emu\retroarch.exe` survive unquoted.
 *
 * @module launch/tokenizer
 */

const WHITESPACE = new Set([' ', '\t', '\n']);

/**
 * Split a command into argument tokens.
 *
 * - Single quotes are literal up to the closing quote.
 * - Inside double quotes `\"` yields `"`; any other backslash is kept.
 *   A `\"` followed by whitespace or the end of input closes the quote
 *   and keeps the backslash.
 * - A backslash before a newline joins the two lines.
 *
 * @returns Tokens in order, or null when a quote is left open
 */
export function tokenizeCommand(command: string): string[] | null {
  const tokens: string[] = [];
  const text = command.replace(/\r\n?/g, '\n');
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const next = text[i + 1];

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '\\' && next === '"' && closesQuote(text[i + 2])) {
        // Trailing directory separator: `"C:\Emu\"`.
        current += ch;
        quote = null;
        i++;
      } else if (ch === '\\' && next === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '\\' && next === '\n') {
      i++;
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    if (ch === '\\' && next !== undefined && (next === '"' || next === "'" || WHITESPACE.has(next))) {
      current += next;
      inToken = true;
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
      continue;
    }

    if (WHITESPACE.has(ch)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (quote !== null) {
    return null;
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

function closesQuote(after: string | undefined): boolean {
  return after === undefined || WHITESPACE.has(after);
}
