/**
 * The contract every backend implements, and the declaration dispatch loop.
 */
import type {
  Doc,
  EnumBody,
  Ident,
  InterfaceBody,
  RecordBody,
  TypeDecl,
  TypeParam,
} from '../ast/types.js';
import { ErrorCodes, GenerateError } from '../../utils/errors.js';

/**
 * One target's generator. All three hooks are required; a backend that has
 * nothing to emit for a kind implements the hook as a no-op.
 */
export interface Backend {
  /** Human-readable target name, used in logs. */
  readonly name: string;

  generateEnum(origin: string, ident: Ident, doc: Doc, body: EnumBody): void;

  generateRecord(
    origin: string,
    ident: Ident,
    doc: Doc,
    params: readonly TypeParam[],
    body: RecordBody
  ): void;

  generateInterface(
    origin: string,
    ident: Ident,
    doc: Doc,
    params: readonly TypeParam[],
    body: InterfaceBody
  ): void;
}

/**
 * Dispatch every locally defined declaration to the backend's hook for its
 * kind, in sequence order. Declarations imported from other modules are
 * skipped.
 */
export function generateDeclarations(idl: readonly TypeDecl[], backend: Backend): void {
  for (const decl of idl) {
    if (decl.scope !== 'intern') continue;

    const { body } = decl;
    switch (body.kind) {
      case 'enum':
        if (decl.params.length > 0) {
          throw new GenerateError(
            ErrorCodes.INVALID_DECLARATION,
            `Enum "${decl.ident.name}" from ${decl.origin} cannot have type parameters.`,
            { ident: decl.ident.name, origin: decl.origin }
          );
        }
        backend.generateEnum(decl.origin, decl.ident, decl.doc, body);
        break;
      case 'record':
        backend.generateRecord(decl.origin, decl.ident, decl.doc, decl.params, body);
        break;
      case 'interface':
        backend.generateInterface(decl.origin, decl.ident, decl.doc, decl.params, body);
        break;
      default: {
        const unknown: never = body;
        throw new GenerateError(
          ErrorCodes.INVALID_DECLARATION,
          `Unsupported declaration kind in ${decl.origin}: ${JSON.stringify(unknown)}`
        );
      }
    }
  }
}
