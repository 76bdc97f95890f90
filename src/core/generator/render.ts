/**
 * Rendering algorithms shared by the backends: namespace wrapping, bit-flag
 * enum encoding, aligned calls and doc comments.
 */
import type { IndentWriter } from '../emit/indent-writer.js';
import type { Doc, EnumBody, EnumOption, Method } from '../ast/types.js';
import type { IdentConverter } from '../ident/styles.js';

export const NAMESPACE_SEPARATOR = '::';

export function quote(s: string): string {
  return `"${s}"`;
}

export function parens(s: string): string {
  return `(${s})`;
}

export function angles(s: string): string {
  return `<${s}>`;
}

/** `, s` for non-empty `s`, otherwise empty. */
export function preComma(s: string): string {
  return s.length === 0 ? s : `, ${s}`;
}

/**
 * Qualify a name with a namespace: undefined leaves it as-is, the empty
 * namespace yields `::name`, `a::b` yields `::a::b::name`.
 */
export function withNs(namespace: string | undefined, name: string): string {
  if (namespace === undefined) return name;
  if (namespace === '') return `${NAMESPACE_SEPARATOR}${name}`;
  return `${NAMESPACE_SEPARATOR}${namespace}${NAMESPACE_SEPARATOR}${name}`;
}

/**
 * Run `body` inside the namespace `ns`. Nested namespaces open on one line
 * and close on one line that names the full namespace. The empty namespace
 * runs `body` unwrapped.
 */
export function wrapNamespace(w: IndentWriter, ns: string, body: (w: IndentWriter) => void): void {
  if (ns === '') {
    body(w);
    return;
  }
  const parts = ns.split(NAMESPACE_SEPARATOR);
  w.wl(parts.map((part) => `namespace ${part} {`).join(' ')).wl();
  body(w);
  w.wl();
  w.wl(`${parts.map(() => '}').join(' ')}  // namespace ${ns}`);
}

export function wrapAnonymousNamespace(w: IndentWriter, body: (w: IndentWriter) => void): void {
  w.wl('namespace { // anonymous namespace');
  w.wl();
  body(w);
  w.wl();
  w.wl('} // end anonymous namespace');
}

// =============================================================================
// Enum options
// =============================================================================

export interface EncodedEnumOption {
  readonly option: EnumOption;
  /** Target name of the option. */
  readonly name: string;
  /** Numeric value; undefined for ordinary and AllFlags options of a non-flag enum. */
  readonly value?: number;
  /** Value as target source text: `0`, `1 << 2`, `READ | WRITE`. */
  readonly expr?: string;
}

/**
 * Order and value the options of an enum:
 *
 * 1. the NoFlags option, value 0;
 * 2. ordinary options in source order, `1 << k` for the k-th when the enum
 *    is a bit-flag enum, otherwise no explicit value;
 * 3. the AllFlags option, the OR of every ordinary option (0 if none);
 *    it carries a numeric value only in a bit-flag enum.
 *
 * The NoFlags and AllFlags options move to their slot wherever they appear
 * in the source.
 */
export function encodeEnumOptions(body: EnumBody, ident: IdentConverter): EncodedEnumOption[] {
  const result: EncodedEnumOption[] = [];
  const normal = body.options.filter((o) => o.specialFlag === undefined);

  const none = body.options.find((o) => o.specialFlag === 'no_flags');
  if (none) {
    result.push({ option: none, name: ident(none.ident.name), value: 0, expr: '0' });
  }

  normal.forEach((option, shift) => {
    const name = ident(option.ident.name);
    result.push(
      body.flags
        ? { option, name, value: 2 ** shift, expr: `1 << ${shift}` }
        : { option, name }
    );
  });

  const all = body.options.find((o) => o.specialFlag === 'all_flags');
  if (all) {
    const names = normal.map((o) => ident(o.ident.name));
    result.push({
      option: all,
      name: ident(all.ident.name),
      value: body.flags ? 2 ** normal.length - 1 : undefined,
      expr: names.length === 0 ? '0' : names.join(' | '),
    });
  }

  return result;
}

/**
 * Write the options of an enum, one per line (`NAME = expr,`), each preceded
 * by its doc comment.
 */
export function writeEnumOptions(w: IndentWriter, body: EnumBody, ident: IdentConverter): void {
  for (const { option, name, expr } of encodeEnumOptions(body, ident)) {
    writeDoc(w, option.doc);
    w.wl(expr === undefined ? `${name},` : `${name} = ${expr},`);
  }
}

// =============================================================================
// Aligned calls
// =============================================================================

/**
 * Write `call` followed by the rendered params, one per line, continuation
 * lines indented to the column after `call`:
 *
 *   Person(std::string first_name_,
 *          int32_t age_)
 */
export function writeAlignedCall<T>(
  w: IndentWriter,
  call: string,
  params: readonly T[],
  end: string,
  render: (param: T) => string,
  delim: string = ','
): IndentWriter {
  w.w(call);
  params.forEach((param, i) => {
    if (i > 0) {
      w.wl(delim);
      w.w(' '.repeat(call.length));
    }
    w.w(render(param));
  });
  return w.w(end);
}

/**
 * Keyword-style variant: `render` returns the keyword and the value of each
 * param. The first keyword is expected to end `call`; later keywords are
 * padded so every `:` lines up in one column.
 *
 *   - (nonnull instancetype)initWithFirstName:(nonnull NSString *)firstName
 *                                         age:(int32_t)age
 */
export function writeAlignedObjcCall<T>(
  w: IndentWriter,
  call: string,
  params: readonly T[],
  end: string,
  render: (param: T) => readonly [keyword: string, value: string]
): IndentWriter {
  w.w(call);
  params.forEach((param, i) => {
    const [keyword, value] = render(param);
    if (i > 0) {
      w.wl();
      w.w(' '.repeat(Math.max(0, call.length - keyword.length)));
      w.w(keyword);
    }
    w.w(`:${value}`);
  });
  return w.w(end);
}

// =============================================================================
// Doc comments
// =============================================================================

/**
 * Doc comment block: nothing for no lines, `/**line *\/` for one line and a
 * starred block for more.
 */
export function writeDoc(w: IndentWriter, doc: Doc): void {
  switch (doc.lines.length) {
    case 0:
      return;
    case 1:
      w.wl(`/**${doc.lines[0]} */`);
      return;
    default:
      w.wl('/**');
      for (const line of doc.lines) {
        w.wl(` *${line}`);
      }
      w.wl(' */');
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace whole-word occurrences of each parameter's canonical name with
 * its target name.
 */
export function rewriteParamNames(doc: Doc, method: Method, ident: IdentConverter): Doc {
  const replacements = method.params.map((p) => ({
    pattern: new RegExp(`\\b${escapeRegExp(p.ident.name)}\\b`, 'g'),
    replacement: ident(p.ident.name),
  }));
  return {
    lines: doc.lines.map((line) =>
      replacements.reduce((text, { pattern, replacement }) => text.replace(pattern, () => replacement), line)
    ),
  };
}

/**
 * Method doc comment with parameter names in their target casing.
 */
export function writeMethodDoc(w: IndentWriter, method: Method, ident: IdentConverter): void {
  writeDoc(w, rewriteParamNames(method.doc, method, ident));
}
