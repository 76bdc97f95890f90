/**
 * Declaration model consumed by the generators.
 *
 * Declarations arrive already parsed and type-checked; nothing here
 * validates IDL semantics.
 */

/** A canonical (underscore-separated) identifier with its source position. */
export interface Ident {
  readonly name: string;
  readonly file?: string;
  readonly line?: number;
}

/** Doc comment lines, without comment markers. */
export interface Doc {
  readonly lines: readonly string[];
}

/** Reference to a builtin or declared type: `list<foo>` is `{ name: 'list', args: [{ name: 'foo' }] }`. */
export interface TypeRef {
  readonly name: string;
  readonly args: readonly TypeRef[];
}

export interface TypeParam {
  readonly ident: Ident;
}

export type SpecialFlag = 'no_flags' | 'all_flags';

export interface EnumOption {
  readonly ident: Ident;
  readonly doc: Doc;
  readonly specialFlag?: SpecialFlag;
}

export interface EnumBody {
  readonly kind: 'enum';
  readonly options: readonly EnumOption[];
  /** Options are combined with bitwise OR. */
  readonly flags: boolean;
}

export interface Field {
  readonly ident: Ident;
  readonly type: TypeRef;
  readonly doc: Doc;
}

export interface RecordBody {
  readonly kind: 'record';
  readonly fields: readonly Field[];
}

export interface Method {
  readonly ident: Ident;
  readonly params: readonly Field[];
  /** Absent for methods returning nothing. */
  readonly ret?: TypeRef;
  readonly doc: Doc;
  readonly static: boolean;
  readonly const: boolean;
}

export interface InterfaceBody {
  readonly kind: 'interface';
  readonly methods: readonly Method[];
}

export type DeclBody = EnumBody | RecordBody | InterfaceBody;

export type DeclKind = DeclBody['kind'];

/**
 * `intern` declarations are defined in the IDL being generated;
 * `extern` ones come from imported modules and are only referenced.
 */
export type DeclScope = 'intern' | 'extern';

export interface TypeDecl {
  readonly ident: Ident;
  readonly params: readonly TypeParam[];
  readonly doc: Doc;
  /** Source the declaration came from, e.g. `example.idl`. */
  readonly origin: string;
  readonly scope: DeclScope;
  readonly body: DeclBody;
}

/** Builtin type names; every other TypeRef name refers to a declaration. */
export const BUILTIN_TYPES = [
  'bool',
  'i8',
  'i16',
  'i32',
  'i64',
  'f32',
  'f64',
  'string',
  'binary',
  'date',
  'list',
  'set',
  'map',
  'optional',
] as const;

export type BuiltinType = (typeof BUILTIN_TYPES)[number];

const BUILTIN_TYPE_SET: ReadonlySet<string> = new Set(BUILTIN_TYPES);

export function isBuiltinType(name: string): name is BuiltinType {
  return BUILTIN_TYPE_SET.has(name);
}

/** Options that are not NoFlags/AllFlags markers, in source order. */
export function normalEnumOptions(body: EnumBody): EnumOption[] {
  return body.options.filter((o) => o.specialFlag === undefined);
}
