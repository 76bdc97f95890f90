/**
 * Tests for the declaration document loader.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadDeclarations, parseDeclarations } from '../../../../src/core/ast/loader.js';
import { isBuiltinType, normalEnumOptions } from '../../../../src/core/ast/types.js';
import { SystemError } from '../../../../src/utils/errors.js';

const DOCUMENT = `
origin: shapes.idl
declarations:
  - name: permission
    kind: enum
    flags: true
    doc: Access rights
    options:
      - { name: none, special: no_flags }
      - { name: read }
      - { name: write }
  - name: point
    kind: record
    params: [coord]
    fields:
      - { name: x, type: coord, doc: "Horizontal\\nposition" }
      - { name: tags, type: "list<string>" }
  - name: canvas
    kind: interface
    extern: true
    origin: canvas.idl
    methods:
      - name: draw
        params:
          - { name: at, type: point }
        return: bool
        const: true
      - name: create
        static: true
`;

describe('parseDeclarations', () => {
  it('should convert every declaration kind', () => {
    const [permission, point, canvas] = parseDeclarations(DOCUMENT);

    expect(permission.ident.name).toBe('permission');
    expect(permission.origin).toBe('shapes.idl');
    expect(permission.scope).toBe('intern');
    expect(permission.doc.lines).toEqual([' Access rights']);
    expect(permission.body).toEqual({
      kind: 'enum',
      flags: true,
      options: [
        { ident: { name: 'none' }, doc: { lines: [] }, specialFlag: 'no_flags' },
        { ident: { name: 'read' }, doc: { lines: [] } },
        { ident: { name: 'write' }, doc: { lines: [] } },
      ],
    });

    expect(point.params).toEqual([{ ident: { name: 'coord' } }]);
    expect(point.body).toEqual({
      kind: 'record',
      fields: [
        { ident: { name: 'x' }, type: { name: 'coord', args: [] }, doc: { lines: [' Horizontal', ' position'] } },
        {
          ident: { name: 'tags' },
          type: { name: 'list', args: [{ name: 'string', args: [] }] },
          doc: { lines: [] },
        },
      ],
    });

    expect(canvas.scope).toBe('extern');
    expect(canvas.origin).toBe('canvas.idl');
    expect(canvas.body).toEqual({
      kind: 'interface',
      methods: [
        {
          ident: { name: 'draw' },
          params: [{ ident: { name: 'at' }, type: { name: 'point', args: [] }, doc: { lines: [] } }],
          ret: { name: 'bool', args: [] },
          doc: { lines: [] },
          static: false,
          const: true,
        },
        { ident: { name: 'create' }, params: [], doc: { lines: [] }, static: true, const: false },
      ],
    });
  });

  it('should keep empty doc lines unprefixed', () => {
    const [decl] = parseDeclarations('declarations:\n  - { name: a, kind: record, doc: ["first", "", "third"] }\n');
    expect(decl.doc.lines).toEqual([' first', '', ' third']);
    expect(decl.origin).toBe('unknown.idl');
  });

  it('should accept an empty document', () => {
    expect(parseDeclarations('')).toEqual([]);
  });

  it('should name the field with a malformed type', () => {
    const content = 'declarations:\n  - name: p\n    kind: record\n    fields: [{ name: x, type: "list<" }]\n';
    expect(() => parseDeclarations(content)).toThrow('Invalid type for p.x: expected a type name in "list<"');
  });

  it('should reject unknown kinds', () => {
    expect(() => parseDeclarations('declarations:\n  - { name: a, kind: union }\n')).toThrow(SystemError);
  });
});

describe('loadDeclarations', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bridgegen-ast-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should load a JSON document', async () => {
    const file = path.join(tmpDir, 'decls.json');
    await fs.writeFile(file, JSON.stringify({ declarations: [{ name: 'empty', kind: 'record' }] }));
    const decls = await loadDeclarations(file);
    expect(decls).toHaveLength(1);
    expect(decls[0].body).toEqual({ kind: 'record', fields: [] });
  });
});

describe('declaration helpers', () => {
  it('should recognise builtin type names', () => {
    expect(isBuiltinType('optional')).toBe(true);
    expect(isBuiltinType('point')).toBe(false);
  });

  it('should list ordinary enum options', () => {
    const [permission] = parseDeclarations(DOCUMENT);
    if (permission.body.kind !== 'enum') throw new Error('expected an enum');
    expect(normalEnumOptions(permission.body).map((o) => o.ident.name)).toEqual(['read', 'write']);
  });
});
