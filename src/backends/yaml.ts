/**
 * YAML backend. Describes every local declaration and the names the other
 * targets give it, so a dependent IDL can reference the type as extern.
 *
 * With `yaml.outFile` set all documents go to that one file, separated by
 * `---`; otherwise each declaration gets its own `<prefix><name>.yaml`.
 */
import type {
  Doc,
  EnumBody,
  Ident,
  InterfaceBody,
  RecordBody,
  DeclBody,
  TypeDecl,
  TypeParam,
} from '../core/ast/types.js';
import type { GeneratorConfig, YamlConfig } from '../core/config/model.js';
import type { Backend } from '../core/generator/backend.js';
import { writeAutogenerationWarning, type GeneratorContext } from '../core/generator/context.js';
import { withNs } from '../core/generator/render.js';
import { stringifyYaml } from '../utils/yaml.js';
import { objcHeaderName } from './objc.js';
import { requireSetting } from './shared.js';

export interface DeclarationDescriptor {
  name: string;
  typedef: string;
  params: string[];
  prefix: string;
  cpp: { typename: string; header: string };
  objc: { typename: string; header: string };
  java: { typename: string };
}

/**
 * Names a declaration gets in each target, as recorded in its YAML document.
 */
export function describeDeclaration(
  config: GeneratorConfig,
  ident: Ident,
  params: readonly TypeParam[],
  body: DeclBody
): DeclarationDescriptor {
  const { cpp, objc, java } = config;
  const name = ident.name;
  const flags = body.kind === 'enum' && body.flags ? ' +f' : '';
  const cppName = body.kind === 'enum' ? cpp.identStyle.enumType(name) : cpp.identStyle.ty(name);
  const javaName = java.identStyle.ty(name);

  return {
    name: `${config.yaml.prefix}${name}`,
    typedef: `${body.kind}${flags}`,
    params: params.map((p) => p.ident.name),
    prefix: config.yaml.prefix,
    cpp: {
      typename: withNs(cpp.namespace, cppName),
      header: `"${cpp.includePrefix}${cpp.fileIdentStyle(name)}.${cpp.headerExt}"`,
    },
    objc: {
      typename: objc.identStyle.ty(name),
      header: `"${objc.includePrefix}${objcHeaderName(objc, name)}"`,
    },
    java: {
      typename: java.package ? `${java.package}.${javaName}` : javaName,
    },
  };
}

export class YamlBackend implements Backend {
  readonly name = 'YAML';
  private readonly cfg: YamlConfig;
  private readonly folder: string;

  constructor(private readonly ctx: GeneratorContext) {
    this.cfg = ctx.config.yaml;
    this.folder = requireSetting('YAML folder', this.cfg.outFolder);
  }

  generateEnum(origin: string, ident: Ident, _doc: Doc, body: EnumBody): void {
    this.write(origin, ident, [], body);
  }

  generateRecord(origin: string, ident: Ident, _doc: Doc, params: readonly TypeParam[], body: RecordBody): void {
    this.write(origin, ident, params, body);
  }

  generateInterface(origin: string, ident: Ident, _doc: Doc, params: readonly TypeParam[], body: InterfaceBody): void {
    this.write(origin, ident, params, body);
  }

  private write(origin: string, ident: Ident, params: readonly TypeParam[], body: DeclBody): void {
    const document = stringifyYaml(describeDeclaration(this.ctx.config, ident, params, body));
    const { emitter } = this.ctx;

    if (this.cfg.outFile === undefined) {
      emitter.createFile(this.folder, `${this.cfg.prefix}${ident.name}.yaml`, (w) => {
        writeAutogenerationWarning(w, origin, '#');
        w.wl('---');
        w.w(document);
      });
      return;
    }

    emitter.createFileOnce(this.folder, this.cfg.outFile, (w) => {
      writeAutogenerationWarning(w, origin, '#');
    });
    emitter.appendToFile(this.folder, this.cfg.outFile, (w) => {
      w.wl('---');
      w.w(document);
    });
  }
}

export function createYamlBackend(ctx: GeneratorContext, _idl: readonly TypeDecl[]): Backend {
  return new YamlBackend(ctx);
}
