/**
 * Parser for the compact type expressions used in declaration files,
 * e.g. `map<string, list<i32>>`.
 */
import type { TypeRef } from './types.js';

const TOKEN_PATTERN = /\s*([A-Za-z_][A-Za-z0-9_.]*|[<>,])/y;

function tokenize(source: string): string[] {
  const tokens: string[] = [];
  TOKEN_PATTERN.lastIndex = 0;
  while (TOKEN_PATTERN.lastIndex < source.length) {
    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(source);
    if (!match) {
      if (source.slice(start).trim().length === 0) break;
      throw new Error(`unexpected character at offset ${start}`);
    }
    tokens.push(match[1]);
  }
  return tokens;
}

/**
 * Parse a type expression. Throws a plain Error with a short reason on
 * malformed input; callers add file context.
 */
export function parseTypeExpr(source: string): TypeRef {
  const tokens = tokenize(source);
  let pos = 0;

  const parseRef = (): TypeRef => {
    const name = tokens[pos];
    if (name === undefined || name === '<' || name === '>' || name === ',') {
      throw new Error(`expected a type name in "${source}"`);
    }
    pos++;
    const args: TypeRef[] = [];
    if (tokens[pos] === '<') {
      pos++;
      args.push(parseRef());
      while (tokens[pos] === ',') {
        pos++;
        args.push(parseRef());
      }
      if (tokens[pos] !== '>') {
        throw new Error(`expected ">" in "${source}"`);
      }
      pos++;
    }
    return { name, args };
  };

  const ref = parseRef();
  if (pos !== tokens.length) {
    throw new Error(`unexpected "${tokens[pos]}" in "${source}"`);
  }
  return ref;
}

/**
 * Render a TypeRef back to its expression form.
 */
export function formatTypeExpr(ref: TypeRef): string {
  if (ref.args.length === 0) return ref.name;
  return `${ref.name}<${ref.args.map(formatTypeExpr).join(', ')}>`;
}
