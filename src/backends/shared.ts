/**
 * Helpers shared by the bundled backends.
 */
import type { DeclKind, TypeDecl, TypeRef } from '../core/ast/types.js';
import { ErrorCodes, GenerateError } from '../utils/errors.js';

/** Kind of every declaration a backend may reference, local or imported. */
export type DeclIndex = ReadonlyMap<string, DeclKind>;

export function indexDeclarations(idl: readonly TypeDecl[]): DeclIndex {
  return new Map(idl.map((decl) => [decl.ident.name, decl.body.kind]));
}

/**
 * Narrow an optional setting a backend cannot run without, such as its
 * output folder.
 */
export function requireSetting(description: string, value: string | undefined): string {
  if (value === undefined) {
    throw new GenerateError(ErrorCodes.MISSING_SETTING, `No ${description} configured.`, { setting: description });
  }
  return value;
}

/** The `index`-th type argument, or a GenerateError naming the type. */
export function typeArg(ref: TypeRef, index: number): TypeRef {
  const arg = ref.args.at(index);
  if (arg === undefined) {
    throw new GenerateError(
      ErrorCodes.INVALID_DECLARATION,
      `Type "${ref.name}" expects at least ${index + 1} type argument(s), got ${ref.args.length}.`,
      { type: ref.name }
    );
  }
  return arg;
}

/** Every type name referenced by `ref`, itself included, depth first. */
export function referencedTypes(ref: TypeRef): string[] {
  return [ref.name, ...ref.args.flatMap(referencedTypes)];
}

/** System includes (`<...>`) first, then quoted ones; each group sorted. */
export function sortIncludes(names: Iterable<string>): string[] {
  const unique = [...new Set(names)];
  const system = unique.filter((n) => n.startsWith('<')).sort();
  const local = unique.filter((n) => !n.startsWith('<')).sort();
  return [...system, ...local];
}
