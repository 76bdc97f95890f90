/**
 * Identifier casing conventions.
 *
 * Canonical identifiers are lower-case words joined by underscores
 * (`foo_bar`). Each style maps a canonical token to one target convention.
 */

/** A pure token-to-token casing transform. */
export type IdentConverter = (token: string) => string;

/** Word delimiter of canonical identifiers. */
export const IDENT_DELIMITER = '_';

/**
 * Upper-case the first character of a token.
 */
export function firstUpper(token: string): string {
  return token.length === 0 ? token : token.charAt(0).toUpperCase() + token.slice(1);
}

function words(token: string): string[] {
  return token.split(IDENT_DELIMITER);
}

/** `foo_bar` → `FooBar` */
export const camelUpper: IdentConverter = (token) => words(token).map(firstUpper).join('');

/** `foo_bar` → `fooBar`; the first word keeps its leading case. */
export const camelLower: IdentConverter = (token) => {
  const [head, ...tail] = words(token);
  return head + tail.map(firstUpper).join('');
};

/** `foo_bar` → `foo_bar` */
export const identityStyle: IdentConverter = (token) => token;

/** `foo_bar` → `Foo_Bar` */
export const underscoreCap: IdentConverter = (token) =>
  words(token).map(firstUpper).join(IDENT_DELIMITER);

/** `foo_bar` → `FOO_BAR` */
export const allCaps: IdentConverter = (token) => token.toUpperCase();

/**
 * Prepend a literal to the output of another style, e.g. `m` + camelUpper
 * turns `foo_bar` into `mFooBar`.
 */
export function withPrefix(literal: string, base: IdentConverter): IdentConverter {
  return (token) => literal + base(token);
}

/** Token every built-in style is applied to when inferring a style. */
export const PROBE_TOKEN = 'foo_bar';

/**
 * Built-in styles in inference precedence order. The first probe that the
 * example ends with wins.
 */
export const STYLE_PROBES: ReadonlyArray<{ readonly probe: string; readonly style: IdentConverter }> = [
  { probe: camelUpper(PROBE_TOKEN), style: camelUpper },
  { probe: camelLower(PROBE_TOKEN), style: camelLower },
  { probe: identityStyle(PROBE_TOKEN), style: identityStyle },
  { probe: underscoreCap(PROBE_TOKEN), style: underscoreCap },
  { probe: allCaps(PROBE_TOKEN), style: allCaps },
];

/**
 * Infer the style that produced `example` from the probe token.
 *
 * `FooBar` yields camelUpper, `mFooBar` yields `withPrefix('m', camelUpper)`
 * and `k_FOO_BAR` yields `withPrefix('k_', allCaps)`. Returns undefined when
 * the example does not end with any probe.
 */
export function infer(example: string): IdentConverter | undefined {
  for (const { probe, style } of STYLE_PROBES) {
    if (example.endsWith(probe)) {
      const literal = example.slice(0, example.length - probe.length);
      return literal.length > 0 ? withPrefix(literal, style) : style;
    }
  }
  return undefined;
}
