/**
 * Per-backend-family identifier style bundles and their defaults.
 */
import {
  allCaps,
  camelLower,
  camelUpper,
  identityStyle,
  infer,
  underscoreCap,
  withPrefix,
  type IdentConverter,
} from './styles.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export interface CppIdentStyle {
  readonly ty: IdentConverter;
  readonly enumType: IdentConverter;
  readonly typeParam: IdentConverter;
  readonly method: IdentConverter;
  readonly field: IdentConverter;
  readonly local: IdentConverter;
  readonly enum: IdentConverter;
  readonly const: IdentConverter;
}

export interface JavaIdentStyle {
  readonly ty: IdentConverter;
  readonly typeParam: IdentConverter;
  readonly method: IdentConverter;
  readonly field: IdentConverter;
  readonly local: IdentConverter;
  readonly enum: IdentConverter;
  readonly const: IdentConverter;
}

export type ObjcIdentStyle = JavaIdentStyle;

export interface PythonIdentStyle {
  readonly ty: IdentConverter;
  readonly className: IdentConverter;
  readonly typeParam: IdentConverter;
  readonly method: IdentConverter;
  readonly field: IdentConverter;
  readonly local: IdentConverter;
  readonly enum: IdentConverter;
  readonly const: IdentConverter;
}

export interface CppCliIdentStyle {
  readonly ty: IdentConverter;
  readonly typeParam: IdentConverter;
  readonly property: IdentConverter;
  readonly method: IdentConverter;
  readonly field: IdentConverter;
  readonly local: IdentConverter;
  readonly enum: IdentConverter;
  readonly const: IdentConverter;
  readonly file: IdentConverter;
}

export const CPP_DEFAULT_STYLE: CppIdentStyle = Object.freeze({
  ty: camelUpper,
  enumType: camelUpper,
  typeParam: camelUpper,
  method: identityStyle,
  field: identityStyle,
  local: identityStyle,
  enum: allCaps,
  const: allCaps,
});

export const JAVA_DEFAULT_STYLE: JavaIdentStyle = Object.freeze({
  ty: camelUpper,
  typeParam: camelUpper,
  method: camelLower,
  field: camelLower,
  local: camelLower,
  enum: allCaps,
  const: allCaps,
});

export const OBJC_DEFAULT_STYLE: ObjcIdentStyle = Object.freeze({
  ty: camelUpper,
  typeParam: camelUpper,
  method: camelLower,
  field: camelLower,
  local: camelLower,
  enum: camelUpper,
  const: camelUpper,
});

export const PYTHON_DEFAULT_STYLE: PythonIdentStyle = Object.freeze({
  ty: identityStyle,
  className: camelUpper,
  typeParam: identityStyle,
  method: identityStyle,
  field: identityStyle,
  local: identityStyle,
  enum: underscoreCap,
  const: allCaps,
});

export const CPP_CLI_DEFAULT_STYLE: CppCliIdentStyle = Object.freeze({
  ty: camelUpper,
  typeParam: camelUpper,
  property: camelUpper,
  method: camelUpper,
  field: withPrefix('_', camelLower),
  local: camelLower,
  enum: camelUpper,
  const: camelUpper,
  file: camelUpper,
});

/**
 * Resolve one example (`mFooBar`, `FOO_BAR`, ...) to a converter.
 * Throws a ConfigError naming the option when the example matches no style.
 */
export function resolveStyleExample(option: string, example: string): IdentConverter {
  const style = infer(example);
  if (!style) {
    throw new ConfigError(
      ErrorCodes.UNKNOWN_IDENT_STYLE,
      `Invalid identifier style example for ${option}: "${example}". ` +
        'Examples must end in FooBar, fooBar, foo_bar, Foo_Bar or FOO_BAR.',
      { option, example }
    );
  }
  return style;
}

/**
 * Build a bundle from defaults, replacing every role that has an example.
 * `section` only names the bundle in error messages.
 */
export function overrideStyles<T extends object>(
  section: string,
  defaults: T,
  examples: Readonly<Record<string, string | undefined>>
): T {
  const overrides: Record<string, IdentConverter> = {};
  for (const [role, example] of Object.entries(examples)) {
    if (example === undefined) continue;
    if (!(role in defaults)) {
      throw new ConfigError(
        ErrorCodes.UNKNOWN_IDENT_STYLE,
        `Unknown identifier role ${section}.${role}`,
        { option: `${section}.${role}` }
      );
    }
    overrides[role] = resolveStyleExample(`${section}.${role}`, example);
  }
  return Object.freeze({ ...defaults, ...overrides });
}
