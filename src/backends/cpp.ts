/**
 * C++ header backend: one header per local declaration.
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
import type { CppConfig } from '../core/config/model.js';
import type { IndentWriter } from '../core/emit/indent-writer.js';
import type { Backend } from '../core/generator/backend.js';
import type { GeneratorContext } from '../core/generator/context.js';
import {
  withNs,
  writeAlignedCall,
  writeDoc,
  writeEnumOptions,
  writeMethodDoc,
} from '../core/generator/render.js';
import {
  indexDeclarations,
  referencedTypes,
  requireSetting,
  sortIncludes,
  typeArg,
  type DeclIndex,
} from './shared.js';

const FLAG_OPERATORS = ['|', '&', '^'] as const;

export class CppBackend implements Backend {
  readonly name = 'C++';
  private readonly cfg: CppConfig;
  private readonly headerFolder: string;

  constructor(
    private readonly ctx: GeneratorContext,
    private readonly decls: DeclIndex
  ) {
    this.cfg = ctx.config.cpp;
    this.headerFolder = requireSetting('C++ header folder', this.cfg.headerOutFolder);
  }

  generateEnum(origin: string, ident: Ident, doc: Doc, body: EnumBody): void {
    const self = this.cfg.identStyle.enumType(ident.name);
    const underlying = body.flags ? 'unsigned' : 'int';
    const hash = this.cfg.enumHashWorkaround;

    this.ctx.writeHeaderFile({
      folder: this.headerFolder,
      fileName: this.headerName(ident.name),
      origin,
      includes: hash ? ['#include <functional>'] : [],
      namespace: this.cfg.namespace,
      body: (w) => {
        writeDoc(w, doc);
        w.wl(`enum class ${self} : ${underlying} {`);
        w.nested(() => writeEnumOptions(w, body, this.cfg.identStyle.enum));
        w.wl('};');
        if (body.flags) {
          for (const op of FLAG_OPERATORS) {
            w.wl();
            w.wl(`constexpr ${self} operator${op}(${self} lhs, ${self} rhs) noexcept {`);
            w.nested(() => {
              w.wl(`return static_cast<${self}>(static_cast<${underlying}>(lhs) ${op} static_cast<${underlying}>(rhs));`);
            });
            w.wl('}');
          }
        }
      },
      after: hash ? (w) => this.writeEnumHash(w, self, underlying) : undefined,
    });
  }

  generateRecord(origin: string, ident: Ident, doc: Doc, params: readonly TypeParam[], body: RecordBody): void {
    const style = this.cfg.identStyle;
    const self = style.ty(ident.name);
    const typeParams = new Set(params.map((p) => p.ident.name));
    const includes = this.includesFor(ident.name, body.fields.map((f) => f.type), typeParams);
    if (body.fields.length > 0) includes.push('<utility>');

    this.ctx.writeHeaderFile({
      folder: this.headerFolder,
      fileName: this.headerName(ident.name),
      origin,
      includes: this.includeLines(includes),
      namespace: this.cfg.namespace,
      body: (w) => {
        writeDoc(w, doc);
        this.writeTemplateHeader(w, params);
        w.wl(`struct ${self} final {`);
        w.nested(() => {
          for (const field of body.fields) {
            writeDoc(w, field.doc);
            w.wl(`${this.typeName(field.type, typeParams)} ${style.field(field.ident.name)};`);
          }
          if (body.fields.length === 0) return;
          w.wl();
          writeAlignedCall(w, `${self}(`, body.fields, ')', (f: Field) =>
            `${this.typeName(f.type, typeParams)} ${style.local(f.ident.name)}_`
          );
          w.wl();
          body.fields.forEach((f, i) => {
            const name = style.field(f.ident.name);
            w.wl(`${i === 0 ? ':' : ','} ${name}(std::move(${style.local(f.ident.name)}_))`);
          });
          w.wl('{}');
        });
        w.wl('};');
      },
    });
  }

  generateInterface(origin: string, ident: Ident, doc: Doc, params: readonly TypeParam[], body: InterfaceBody): void {
    const style = this.cfg.identStyle;
    const self = style.ty(ident.name);
    const typeParams = new Set(params.map((p) => p.ident.name));
    const refs = body.methods.flatMap((m) => [...m.params.map((p) => p.type), ...(m.ret ? [m.ret] : [])]);
    const includes = this.includesFor(ident.name, refs, typeParams);
    if (refs.some((ref) => referencedTypes(ref).includes(ident.name))) includes.push('<memory>');

    this.ctx.writeHeaderFile({
      folder: this.headerFolder,
      fileName: this.headerName(ident.name),
      origin,
      includes: this.includeLines(includes),
      namespace: this.cfg.namespace,
      body: (w) => {
        writeDoc(w, doc);
        this.writeTemplateHeader(w, params);
        w.wl(`class ${self} {`);
        w.wl('public:');
        w.nested(() => {
          w.wl(`virtual ~${self}() = default;`);
          for (const method of body.methods) {
            w.wl();
            writeMethodDoc(w, method, style.local);
            w.wl(this.methodSignature(method, typeParams));
          }
        });
        w.wl('};');
      },
    });
  }

  /** C++ spelling of a type reference. */
  typeName(ref: TypeRef, typeParams: ReadonlySet<string> = new Set()): string {
    const arg = (i: number): string => this.typeName(typeArg(ref, i), typeParams);
    switch (ref.name) {
      case 'bool':
        return 'bool';
      case 'i8':
      case 'i16':
      case 'i32':
      case 'i64':
        return `int${ref.name.slice(1)}_t`;
      case 'f32':
        return 'float';
      case 'f64':
        return 'double';
      case 'string':
        return 'std::string';
      case 'binary':
        return 'std::vector<uint8_t>';
      case 'date':
        return 'std::chrono::system_clock::time_point';
      case 'list':
        return `std::vector<${arg(0)}>`;
      case 'set':
        return `std::unordered_set<${arg(0)}>`;
      case 'map':
        return `std::unordered_map<${arg(0)}, ${arg(1)}>`;
      case 'optional':
        return `${this.cfg.optionalTemplate}<${arg(0)}>`;
    }

    if (typeParams.has(ref.name)) return this.cfg.identStyle.typeParam(ref.name);

    const kind = this.decls.get(ref.name);
    const style = this.cfg.identStyle;
    const args = ref.args.length === 0 ? '' : `<${ref.args.map((_, i) => arg(i)).join(', ')}>`;
    const qualified = withNs(this.cfg.namespace, (kind === 'enum' ? style.enumType : style.ty)(ref.name)) + args;
    return kind === 'interface' ? `std::shared_ptr<${qualified}>` : qualified;
  }

  private methodSignature(method: Method, typeParams: ReadonlySet<string>): string {
    const style = this.cfg.identStyle;
    const ret = method.ret ? this.typeName(method.ret, typeParams) : 'void';
    const params = method.params
      .map((p) => `${this.constRef(p.type, typeParams)} ${style.local(p.ident.name)}`)
      .join(', ');
    const name = style.method(method.ident.name);
    if (method.static) return `static ${ret} ${name}(${params});`;
    return `virtual ${ret} ${name}(${params})${method.const ? ' const' : ''} = 0;`;
  }

  private constRef(ref: TypeRef, typeParams: ReadonlySet<string>): string {
    const name = this.typeName(ref, typeParams);
    return isPrimitive(ref) || this.decls.get(ref.name) === 'enum' ? name : `const ${name} &`;
  }

  private writeTemplateHeader(w: IndentWriter, params: readonly TypeParam[]): void {
    if (params.length === 0) return;
    const names = params.map((p) => `typename ${this.cfg.identStyle.typeParam(p.ident.name)}`);
    w.wl(`template <${names.join(', ')}>`);
  }

  private writeEnumHash(w: IndentWriter, self: string, underlying: string): void {
    const qualified = withNs(this.cfg.namespace, self);
    w.wl();
    w.wl('namespace std {');
    w.wl();
    w.wl('template <>');
    w.wl(`struct hash<${qualified}> {`);
    w.nested(() => {
      w.wl(`size_t operator()(${qualified} type) const {`);
      w.nested(() => w.wl(`return std::hash<${underlying}>()(static_cast<${underlying}>(type));`));
      w.wl('}');
    });
    w.wl('};');
    w.wl();
    w.wl('}  // namespace std');
  }

  private headerName(name: string): string {
    return `${this.cfg.fileIdentStyle(name)}.${this.cfg.headerExt}`;
  }

  /** Include targets (`<vector>`, `"prefix/foo.hpp"`) needed by `refs`. */
  private includesFor(self: string, refs: readonly TypeRef[], typeParams: ReadonlySet<string>): string[] {
    const result: string[] = [];
    const visit = (ref: TypeRef): void => {
      ref.args.forEach(visit);
      switch (ref.name) {
        case 'bool':
        case 'f32':
        case 'f64':
          return;
        case 'i8':
        case 'i16':
        case 'i32':
        case 'i64':
          result.push('<cstdint>');
          return;
        case 'string':
          result.push('<string>');
          return;
        case 'binary':
          result.push('<vector>', '<cstdint>');
          return;
        case 'date':
          result.push('<chrono>');
          return;
        case 'list':
          result.push('<vector>');
          return;
        case 'set':
          result.push('<unordered_set>');
          return;
        case 'map':
          result.push('<unordered_map>');
          return;
        case 'optional':
          result.push(this.cfg.optionalHeader);
          return;
      }
      if (typeParams.has(ref.name) || ref.name === self) return;
      const kind = this.decls.get(ref.name);
      if (kind === 'interface') result.push('<memory>');
      result.push(`"${this.cfg.includePrefix}${this.headerName(ref.name)}"`);
    };
    refs.forEach(visit);
    return result;
  }

  private includeLines(includes: readonly string[]): string[] {
    return sortIncludes(includes).map((target) => `#include ${target}`);
  }
}

function isPrimitive(ref: TypeRef): boolean {
  return ['bool', 'i8', 'i16', 'i32', 'i64', 'f32', 'f64'].includes(ref.name);
}

export function createCppBackend(ctx: GeneratorContext, idl: readonly TypeDecl[]): Backend {
  return new CppBackend(ctx, indexDeclarations(idl));
}
