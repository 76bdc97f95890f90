/**
 * Swift bridging header: an umbrella header in the Objective-C header folder
 * that imports the Objective-C header of every local declaration.
 */
import type { Doc, EnumBody, Ident, InterfaceBody, RecordBody, TypeDecl, TypeParam } from '../core/ast/types.js';
import type { ObjcConfig } from '../core/config/model.js';
import type { Backend } from '../core/generator/backend.js';
import { writeAutogenerationWarning, type GeneratorContext } from '../core/generator/context.js';
import { objcHeaderName } from './objc.js';
import { requireSetting } from './shared.js';

export class SwiftBridgingHeaderBackend implements Backend {
  readonly name = 'Swift bridging header';
  private readonly cfg: ObjcConfig;
  private readonly folder: string;
  private readonly fileName: string;

  constructor(private readonly ctx: GeneratorContext) {
    this.cfg = ctx.config.objc;
    this.folder = requireSetting('Objective-C header folder', this.cfg.headerOutFolder);
    const headerName = requireSetting('Swift bridging header name', this.cfg.swiftBridgingHeaderName);
    this.fileName = `${headerName}.h`;

    ctx.emitter.createFile(this.folder, this.fileName, (w) => {
      writeAutogenerationWarning(w, ctx.config.idlFileName);
      w.wl();
      w.wl('#import <Foundation/Foundation.h>');
      w.wl();
      w.wl(`FOUNDATION_EXPORT double ${headerName}VersionNumber;`);
      w.wl(`FOUNDATION_EXPORT const unsigned char ${headerName}VersionString[];`);
      w.wl();
    });
  }

  generateEnum(_origin: string, ident: Ident, _doc: Doc, _body: EnumBody): void {
    this.addImport(ident);
  }

  generateRecord(_origin: string, ident: Ident, _doc: Doc, _params: readonly TypeParam[], _body: RecordBody): void {
    this.addImport(ident);
  }

  generateInterface(
    _origin: string,
    ident: Ident,
    _doc: Doc,
    _params: readonly TypeParam[],
    _body: InterfaceBody
  ): void {
    this.addImport(ident);
  }

  private addImport(ident: Ident): void {
    this.ctx.emitter.appendToFile(this.folder, this.fileName, (w) => {
      w.wl(`#import "${this.cfg.includePrefix}${objcHeaderName(this.cfg, ident.name)}"`);
    });
  }
}

export function createSwiftBridgingHeaderBackend(ctx: GeneratorContext, _idl: readonly TypeDecl[]): Backend {
  return new SwiftBridgingHeaderBackend(ctx);
}
