/**
 * Tests for declaration dispatch.
 */
import { describe, it, expect } from 'vitest';
import { generateDeclarations, type Backend } from '../../../../src/core/generator/backend.js';
import { GenerateError } from '../../../../src/utils/errors.js';
import { enumDecl, field, interfaceDecl, option, recordDecl } from '../../../helpers/declarations.js';

function recordingBackend(calls: string[]): Backend {
  return {
    name: 'recording',
    generateEnum: (origin, ident) => calls.push(`enum ${ident.name} from ${origin}`),
    generateRecord: (origin, ident, _doc, params) =>
      calls.push(`record ${ident.name}<${params.map((p) => p.ident.name).join(',')}>`),
    generateInterface: (origin, ident) => calls.push(`interface ${ident.name}`),
  };
}

describe('generateDeclarations', () => {
  it('should dispatch each local declaration in order', () => {
    const calls: string[] = [];
    generateDeclarations(
      [
        recordDecl('point', [field('x', 'i32')], { params: ['t'] }),
        enumDecl('color', [option('red')], false, { origin: 'colors.idl' }),
        interfaceDecl('canvas', []),
      ],
      recordingBackend(calls)
    );
    expect(calls).toEqual(['record point<t>', 'enum color from colors.idl', 'interface canvas']);
  });

  it('should skip imported declarations', () => {
    const calls: string[] = [];
    generateDeclarations(
      [recordDecl('imported', [], { scope: 'extern' }), recordDecl('local', [])],
      recordingBackend(calls)
    );
    expect(calls).toEqual(['record local<>']);
  });

  it('should do nothing for an empty list', () => {
    const calls: string[] = [];
    generateDeclarations([], recordingBackend(calls));
    expect(calls).toEqual([]);
  });

  it('should reject an enum with type parameters', () => {
    const calls: string[] = [];
    const run = (): void =>
      generateDeclarations(
        [recordDecl('first', []), enumDecl('bad', [], false, { params: ['t'] }), recordDecl('last', [])],
        recordingBackend(calls)
      );
    expect(run).toThrow(GenerateError);
    expect(run).toThrow('Enum "bad" from test.idl cannot have type parameters.');
    expect(calls).toEqual(['record first<>', 'record first<>']);
  });
});
