/**
 * Objective-C header backend. Enums become NS_ENUM/NS_OPTIONS typedefs,
 * records and interfaces become `@interface` declarations.
 */
import type {
  Doc,
  EnumBody,
  Field,
  Ident,
  InterfaceBody,
  Method,
  RecordBody,
  TypeDecl,
  TypeParam,
  TypeRef,
} from '../core/ast/types.js';
import type { ObjcConfig } from '../core/config/model.js';
import type { IndentWriter, WriteBody } from '../core/emit/index.js';
import type { Backend } from '../core/generator/backend.js';
import { writeAutogenerationWarning, type GeneratorContext } from '../core/generator/context.js';
import { writeAlignedObjcCall, writeDoc, writeEnumOptions, writeMethodDoc } from '../core/generator/render.js';
import { firstUpper } from '../core/ident/styles.js';
import { indexDeclarations, referencedTypes, requireSetting, typeArg, type DeclIndex } from './shared.js';

const FOUNDATION_IMPORT = '#import <Foundation/Foundation.h>';

const SCALARS: ReadonlyMap<string, string> = new Map([
  ['bool', 'BOOL'],
  ['i8', 'int8_t'],
  ['i16', 'int16_t'],
  ['i32', 'int32_t'],
  ['i64', 'int64_t'],
  ['f32', 'float'],
  ['f64', 'double'],
]);

/** Header file name of a declaration, shared with the bridging header. */
export function objcHeaderName(cfg: ObjcConfig, name: string): string {
  return `${cfg.fileIdentStyle(name)}.${cfg.headerExt}`;
}

export interface ObjcType {
  /** Spelling in a declaration, `NSString *` or `int32_t`. */
  readonly name: string;
  /** Spelling inside a generic collection. */
  readonly boxed: string;
  readonly nullability?: 'nonnull' | 'nullable';
}

export class ObjcBackend implements Backend {
  readonly name = 'Objective-C';
  private readonly cfg: ObjcConfig;
  private readonly headerFolder: string;

  constructor(
    private readonly ctx: GeneratorContext,
    private readonly decls: DeclIndex
  ) {
    this.cfg = ctx.config.objc;
    this.headerFolder = requireSetting('Objective-C header folder', this.cfg.headerOutFolder);
  }

  generateEnum(origin: string, ident: Ident, doc: Doc, body: EnumBody): void {
    const self = this.cfg.identStyle.ty(ident.name);
    const macro = body.flags ? 'NS_OPTIONS' : this.cfg.closedEnums ? 'NS_CLOSED_ENUM' : 'NS_ENUM';
    const underlying = body.flags ? 'NSUInteger' : 'NSInteger';

    this.writeHeader(origin, ident.name, [], (w) => {
      writeDoc(w, doc);
      w.wl(`typedef ${macro}(${underlying}, ${self})`);
      w.wl('{');
      w.nested(() => writeEnumOptions(w, body, (name) => self + this.cfg.identStyle.enum(name)));
      w.wl('};');
    });
  }

  generateRecord(origin: string, ident: Ident, doc: Doc, _params: readonly TypeParam[], body: RecordBody): void {
    const style = this.cfg.identStyle;
    const self = style.ty(ident.name);
    const refs = body.fields.map((f) => f.type);

    this.writeHeader(origin, ident.name, refs, (w) => {
      writeDoc(w, doc);
      w.wl(`@interface ${self} : NSObject`);
      this.writeInitializer(w, '- (nonnull instancetype)init', body.fields);
      this.writeInitializer(w, `+ (nonnull instancetype)${style.local(ident.name)}`, body.fields);
      for (const field of body.fields) {
        const type = this.objcType(field.type);
        const attrs = ['nonatomic', 'readonly', ...(type.nullability ? [type.nullability] : [])];
        w.wl();
        writeDoc(w, field.doc);
        w.wl(`@property (${attrs.join(', ')}) ${declare(type.name, style.field(field.ident.name))};`);
      }
      w.wl();
      w.wl('@end');
    });
  }

  generateInterface(origin: string, ident: Ident, doc: Doc, _params: readonly TypeParam[], body: InterfaceBody): void {
    const self = this.cfg.identStyle.ty(ident.name);
    const refs = body.methods.flatMap((m) => [...m.params.map((p) => p.type), ...(m.ret ? [m.ret] : [])]);

    this.writeHeader(origin, ident.name, refs, (w) => {
      writeDoc(w, doc);
      w.wl(`@interface ${self} : NSObject`);
      for (const method of body.methods) {
        w.wl();
        writeMethodDoc(w, method, this.cfg.identStyle.local);
        this.writeMethod(w, method);
      }
      w.wl();
      w.wl('@end');
    });
  }

  private writeInitializer(w: IndentWriter, prefix: string, fields: readonly Field[]): void {
    const first = fields.at(0);
    if (first === undefined) {
      w.wl(`${prefix};`);
      return;
    }
    const local = this.cfg.identStyle.local;
    writeAlignedObjcCall(w, `${prefix}With${firstUpper(local(first.ident.name))}`, fields, ';', (f) => [
      local(f.ident.name),
      `(${this.paramType(f.type)})${local(f.ident.name)}`,
    ]);
    w.wl();
  }

  private writeMethod(w: IndentWriter, method: Method): void {
    const style = this.cfg.identStyle;
    const ret = method.ret ? this.paramType(method.ret) : 'void';
    const call = `${method.static ? '+' : '-'} (${ret})${style.method(method.ident.name)}`;
    writeAlignedObjcCall(w, call, method.params, ';', (p) => [
      style.local(p.ident.name),
      `(${this.paramType(p.type)})${style.local(p.ident.name)}`,
    ]);
    w.wl();
  }

  private paramType(ref: TypeRef): string {
    const type = this.objcType(ref);
    return type.nullability ? `${type.nullability} ${type.name}` : type.name;
  }

  /** Objective-C spelling of a type reference. */
  objcType(ref: TypeRef): ObjcType {
    const scalar = SCALARS.get(ref.name);
    if (scalar !== undefined) return { name: scalar, boxed: 'NSNumber *' };

    const object = (name: string): ObjcType => ({ name, boxed: name, nullability: 'nonnull' });
    switch (ref.name) {
      case 'string':
        return object('NSString *');
      case 'binary':
        return object('NSData *');
      case 'date':
        return object('NSDate *');
      case 'list':
        return object(`NSArray<${this.objcType(typeArg(ref, 0)).boxed}> *`);
      case 'set':
        return object(`NSSet<${this.objcType(typeArg(ref, 0)).boxed}> *`);
      case 'map': {
        const key = this.objcType(typeArg(ref, 0)).boxed;
        return object(`NSDictionary<${key}, ${this.objcType(typeArg(ref, 1)).boxed}> *`);
      }
      case 'optional': {
        const inner = this.objcType(typeArg(ref, 0));
        return { name: inner.boxed, boxed: inner.boxed, nullability: 'nullable' };
      }
    }

    const name = this.cfg.identStyle.ty(ref.name);
    if (this.decls.get(ref.name) === 'enum') return { name, boxed: 'NSNumber *' };
    return object(`${name} *`);
  }

  private writeHeader(origin: string, name: string, refs: readonly TypeRef[], body: WriteBody): void {
    const imports = new Set<string>();
    for (const typeName of refs.flatMap(referencedTypes)) {
      if (typeName !== name && this.decls.has(typeName)) {
        imports.add(`#import "${this.cfg.includePrefix}${objcHeaderName(this.cfg, typeName)}"`);
      }
    }

    this.ctx.emitter.createFile(this.headerFolder, objcHeaderName(this.cfg, name), (w) => {
      writeAutogenerationWarning(w, origin);
      w.wl();
      w.wl(FOUNDATION_IMPORT);
      [...imports].sort().forEach((line) => w.wl(line));
      w.wl();
      body(w);
    });
  }
}

function declare(type: string, name: string): string {
  return type.endsWith('*') ? `${type}${name}` : `${type} ${name}`;
}

export function createObjcBackend(ctx: GeneratorContext, idl: readonly TypeDecl[]): Backend {
  return new ObjcBackend(ctx, indexDeclarations(idl));
}
