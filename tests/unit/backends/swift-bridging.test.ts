/**
 * Tests for the Swift bridging header backend.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { createSwiftBridgingHeaderBackend } from '../../../src/backends/swift-bridging.js';
import { mergeConfig } from '../../../src/core/config/loader.js';
import { FileEmitter } from '../../../src/core/emit/file-emitter.js';
import { GenerationSession } from '../../../src/core/emit/session.js';
import { generateDeclarations } from '../../../src/core/generator/backend.js';
import { GeneratorContext } from '../../../src/core/generator/context.js';
import { enumDecl, interfaceDecl, option, recordDecl } from '../../helpers/declarations.js';

describe('SwiftBridgingHeaderBackend', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridgegen-swift-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const idl = [
    enumDecl('color', [option('red')]),
    recordDecl('point', []),
    interfaceDecl('canvas', [], { scope: 'extern' }),
  ];

  function context(skipGeneration: boolean, session: GenerationSession): GeneratorContext {
    const config = mergeConfig({
      idl_file_name: 'shapes.idl',
      objc: { out_folder: tmpDir, swift_bridging_header_name: 'Shapes', include_prefix: 'objc/' },
    });
    return new GeneratorContext(config, new FileEmitter(session, { skipGeneration }));
  }

  it('should import the header of every local declaration', () => {
    const ctx = context(false, new GenerationSession());
    generateDeclarations(idl, createSwiftBridgingHeaderBackend(ctx, idl));

    expect(fs.readFileSync(path.join(tmpDir, 'Shapes.h'), 'utf-8')).toBe(
      [
        '// AUTOGENERATED FILE - DO NOT MODIFY!',
        '// This file was generated by bridgegen from shapes.idl',
        '',
        '#import <Foundation/Foundation.h>',
        '',
        'FOUNDATION_EXPORT double ShapesVersionNumber;',
        'FOUNDATION_EXPORT const unsigned char ShapesVersionString[];',
        '',
        '#import "objc/Color.h"',
        '#import "objc/Point.h"',
        '',
      ].join('\n')
    );
  });

  it('should only record the header path in a dry run', () => {
    const session = new GenerationSession({ recordManifest: true });
    const ctx = context(true, session);
    generateDeclarations(idl, createSwiftBridgingHeaderBackend(ctx, idl));

    expect(session.manifest).toEqual([path.join(tmpDir, 'Shapes.h')]);
    expect(fs.existsSync(path.join(tmpDir, 'Shapes.h'))).toBe(false);
  });
});
