import { RuleSyntaxError } from "../shared/errors.js";

export type Token =
  | { kind: "number"; value: number; pos: number }
  | { kind: "string"; value: string; pos: number }
  | { kind: "name"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "eof"; pos: number };

/**
 * Punctuation the lexer recognizes, longest first. Several of these are only
 * recognized so the parser can name and reject the construct they start.
 */
const OPERATORS = [
  "**", "//", "==", "!=", "<=", ">=", "<<", ">>", ":=",
  "<", ">", "+", "-", "*", "/", "%", "(", ")",
  "[", "]", "{", "}", ".", ",", ":", ";", "=",
  "&", "|", "^", "~", "@",
];

const NUMBER_RE = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const NAME_RE = /[\p{L}_][\p{L}\p{N}_]*/uy;
const WHITESPACE_RE = /\s+/y;

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let value = "";
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === quote) return { value, end: i + 1 };
    if (ch === "\\" && i + 1 < source.length) {
      const next = source[i + 1];
      value += ESCAPES[next] ?? `\\${next}`;
      i += 2;
      continue;
    }
    value += ch;
    i++;
  }
  throw new RuleSyntaxError(`unterminated string literal starting at ${start}`, start);
}

function matchAt(re: RegExp, source: string, pos: number): string | null {
  re.lastIndex = pos;
  const m = re.exec(source);
  return m ? m[0] : null;
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ws = matchAt(WHITESPACE_RE, source, pos);
    if (ws) {
      pos += ws.length;
      continue;
    }

    const ch = source[pos];

    if (ch === "'" || ch === '"') {
      const { value, end } = readString(source, pos);
      tokens.push({ kind: "string", value, pos });
      pos = end;
      continue;
    }

    const num = /[\d.]/.test(ch) ? matchAt(NUMBER_RE, source, pos) : null;
    if (num) {
      tokens.push({ kind: "number", value: Number(num), pos });
      pos += num.length;
      continue;
    }

    const name = matchAt(NAME_RE, source, pos);
    if (name) {
      tokens.push({ kind: "name", value: name, pos });
      pos += name.length;
      continue;
    }

    const op = OPERATORS.find((o) => source.startsWith(o, pos));
    if (op) {
      tokens.push({ kind: "op", value: op, pos });
      pos += op.length;
      continue;
    }

    throw new RuleSyntaxError(`unexpected character "${ch}" at ${pos}`, pos);
  }

  tokens.push({ kind: "eof", pos: source.length });
  return tokens;
}
