/**
 * Loads a serialised, already type-checked declaration list from YAML or JSON.
 *
 * Document shape:
 *
 *   origin: example.idl
 *   declarations:
 *     - name: permission
 *       kind: enum
 *       flags: true
 *       options:
 *         - { name: none, special: no_flags }
 *         - { name: read, doc: "Can read" }
 *     - name: person
 *       kind: record
 *       fields:
 *         - { name: first_name, type: string }
 *
 * Doc text is split into lines and each non-empty line gets one leading
 * space, matching what the IDL parser keeps after a `#` marker.
 */
import { z } from 'zod';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { parseTypeExpr } from './type-expr.js';
import type { Doc, EnumOption, Field, Method, TypeDecl, TypeRef } from './types.js';

const DocSchema = z.union([z.string(), z.array(z.string())]).optional();

const FieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  doc: DocSchema,
});

const EnumOptionSchema = z.object({
  name: z.string().min(1),
  doc: DocSchema,
  special: z.enum(['no_flags', 'all_flags']).optional(),
});

const MethodSchema = z.object({
  name: z.string().min(1),
  params: z.array(FieldSchema).default([]),
  return: z.string().optional(),
  doc: DocSchema,
  static: z.boolean().default(false),
  const: z.boolean().default(false),
});

const DeclBaseSchema = {
  name: z.string().min(1),
  doc: DocSchema,
  origin: z.string().optional(),
  extern: z.boolean().default(false),
  params: z.array(z.string()).default([]),
};

export const DeclarationSchema = z.discriminatedUnion('kind', [
  z.object({
    ...DeclBaseSchema,
    kind: z.literal('enum'),
    flags: z.boolean().default(false),
    options: z.array(EnumOptionSchema).default([]),
  }),
  z.object({
    ...DeclBaseSchema,
    kind: z.literal('record'),
    fields: z.array(FieldSchema).default([]),
  }),
  z.object({
    ...DeclBaseSchema,
    kind: z.literal('interface'),
    methods: z.array(MethodSchema).default([]),
  }),
]);

export const DeclarationFileSchema = z.object({
  origin: z.string().default('unknown.idl'),
  declarations: z.array(DeclarationSchema).default([]),
});

export type DeclarationFile = z.infer<typeof DeclarationFileSchema>;
type DeclarationInput = z.infer<typeof DeclarationSchema>;
type FieldInput = z.infer<typeof FieldSchema>;

function toDoc(doc: string | string[] | undefined): Doc {
  if (doc === undefined) return { lines: [] };
  const lines = typeof doc === 'string' ? doc.replace(/\n$/, '').split('\n') : doc;
  return { lines: lines.map((line) => (line.length > 0 ? ` ${line}` : line)) };
}

function toTypeRef(expr: string, where: string): TypeRef {
  try {
    return parseTypeExpr(expr);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.INVALID_DOCUMENT,
      `Invalid type for ${where}: ${error instanceof Error ? error.message : String(error)}`,
      { where, type: expr }
    );
  }
}

function toField(input: FieldInput, owner: string): Field {
  return {
    ident: { name: input.name },
    type: toTypeRef(input.type, `${owner}.${input.name}`),
    doc: toDoc(input.doc),
  };
}

function toDeclaration(input: DeclarationInput, defaultOrigin: string): TypeDecl {
  const base = {
    ident: { name: input.name },
    params: input.params.map((name) => ({ ident: { name } })),
    doc: toDoc(input.doc),
    origin: input.origin ?? defaultOrigin,
    scope: input.extern ? ('extern' as const) : ('intern' as const),
  };

  switch (input.kind) {
    case 'enum': {
      const options: EnumOption[] = input.options.map((o) => ({
        ident: { name: o.name },
        doc: toDoc(o.doc),
        ...(o.special ? { specialFlag: o.special } : {}),
      }));
      return { ...base, body: { kind: 'enum', options, flags: input.flags } };
    }
    case 'record':
      return {
        ...base,
        body: { kind: 'record', fields: input.fields.map((f) => toField(f, input.name)) },
      };
    case 'interface': {
      const methods: Method[] = input.methods.map((m) => ({
        ident: { name: m.name },
        params: m.params.map((p) => toField(p, `${input.name}.${m.name}`)),
        ...(m.return !== undefined ? { ret: toTypeRef(m.return, `${input.name}.${m.name}`) } : {}),
        doc: toDoc(m.doc),
        static: m.static,
        const: m.const,
      }));
      return { ...base, body: { kind: 'interface', methods } };
    }
  }
}

/**
 * Convert a validated declaration document into the declaration model.
 */
export function toDeclarations(file: DeclarationFile): TypeDecl[] {
  return file.declarations.map((d) => toDeclaration(d, file.origin));
}

/**
 * Parse declarations from YAML (or JSON, which is valid YAML) text.
 */
export function parseDeclarations(content: string): TypeDecl[] {
  return toDeclarations(parseYamlWithSchema(content, DeclarationFileSchema));
}

/**
 * Load declarations from a YAML or JSON file.
 */
export async function loadDeclarations(filePath: string): Promise<TypeDecl[]> {
  return toDeclarations(await loadYamlWithSchema(filePath, DeclarationFileSchema));
}
