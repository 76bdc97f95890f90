/**
 * Immutable configuration model shared by every backend of a run.
 *
 * A backend is enabled exactly when its `outFolder` is present. Header
 * folders default to the backend's main folder.
 */
import * as path from 'node:path';
import {
  CPP_CLI_DEFAULT_STYLE,
  CPP_DEFAULT_STYLE,
  JAVA_DEFAULT_STYLE,
  OBJC_DEFAULT_STYLE,
  PYTHON_DEFAULT_STYLE,
  overrideStyles,
  resolveStyleExample,
  type CppCliIdentStyle,
  type CppIdentStyle,
  type JavaIdentStyle,
  type ObjcIdentStyle,
  type PythonIdentStyle,
} from '../ident/bundles.js';
import { camelLower, type IdentConverter } from '../ident/styles.js';
import type { ConfigInput } from './schema.js';

export interface CppConfig {
  readonly outFolder?: string;
  readonly headerOutFolder?: string;
  readonly includePrefix: string;
  readonly namespace: string;
  readonly identStyle: CppIdentStyle;
  readonly fileIdentStyle: IdentConverter;
  readonly headerExt: string;
  readonly optionalTemplate: string;
  readonly optionalHeader: string;
  /** Emit a `std::hash` specialisation next to each enum. */
  readonly enumHashWorkaround: boolean;
}

export interface JavaConfig {
  readonly outFolder?: string;
  readonly package?: string;
  readonly identStyle: JavaIdentStyle;
}

export interface JniConfig {
  readonly outFolder?: string;
  readonly headerOutFolder?: string;
  readonly includePrefix: string;
  readonly includeCppPrefix: string;
  readonly namespace: string;
  readonly classIdentStyle: IdentConverter;
  readonly fileIdentStyle: IdentConverter;
}

export interface ObjcConfig {
  readonly outFolder?: string;
  readonly headerOutFolder?: string;
  readonly identStyle: ObjcIdentStyle;
  readonly fileIdentStyle: IdentConverter;
  readonly includePrefix: string;
  readonly headerExt: string;
  readonly swiftBridgingHeaderName?: string;
  /** Declare enums with NS_CLOSED_ENUM instead of NS_ENUM. */
  readonly closedEnums: boolean;
}

export interface ObjcppConfig {
  readonly outFolder?: string;
  readonly headerOutFolder?: string;
  readonly ext: string;
  readonly includePrefix: string;
  readonly includeCppPrefix: string;
  readonly includeObjcPrefix: string;
  readonly namespace: string;
}

export interface CppCliConfig {
  readonly outFolder?: string;
  readonly identStyle: CppCliIdentStyle;
  readonly namespace: string;
  readonly includeCppPrefix: string;
}

export interface YamlConfig {
  readonly outFolder?: string;
  /** Single file collecting every declaration; one file per declaration when absent. */
  readonly outFile?: string;
  readonly prefix: string;
}

export interface PythonConfig {
  readonly outFolder?: string;
  readonly identStyle: PythonIdentStyle;
  readonly importPrefix: string;
}

export interface CWrapperConfig {
  readonly outFolder?: string;
  readonly headerOutFolder?: string;
  readonly includePrefix: string;
  readonly includeCppPrefix: string;
}

export interface CffiConfig {
  readonly outFolder?: string;
  readonly packageName: string;
  readonly dynamicLibList: string;
}

export interface GeneratorConfig {
  /** Name of the IDL file, used in generated banners. */
  readonly idlFileName: string;
  /** Dry run: claim paths (and record them) without touching the filesystem. */
  readonly skipGeneration: boolean;
  /** Manifest file receiving every claimed output path. */
  readonly outFileList?: string;
  readonly cpp: CppConfig;
  readonly java: JavaConfig;
  readonly jni: JniConfig;
  readonly objc: ObjcConfig;
  readonly objcpp: ObjcppConfig;
  readonly cppCli: CppCliConfig;
  readonly yaml: YamlConfig;
  readonly python: PythonConfig;
  readonly cWrapper: CWrapperConfig;
  readonly cffi: CffiConfig;
}

export interface BuildConfigOptions {
  /** Directory relative folders are resolved against. Defaults to the cwd. */
  baseDir?: string;
}

function styleExamples(input: Readonly<Record<string, string | undefined>>): Record<string, string | undefined> {
  const examples: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(input)) {
    examples[camelLower(key)] = value;
  }
  return examples;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable configuration model from validated input.
 */
export function buildConfig(input: ConfigInput, options: BuildConfigOptions = {}): GeneratorConfig {
  const baseDir = options.baseDir ?? process.cwd();
  const folder = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(baseDir, value);
  const headerFolder = (main: string | undefined, header: string | undefined): string | undefined =>
    main === undefined ? undefined : folder(header) ?? folder(main);

  const { cpp, java, jni, objc, objcpp, cpp_cli: cppCli, yaml, python, c_wrapper: cWrapper, cffi } = input;

  const config: GeneratorConfig = {
    idlFileName: input.idl_file_name,
    skipGeneration: input.skip_generation,
    outFileList: folder(input.list_out_files),
    cpp: {
      outFolder: folder(cpp.out_folder),
      headerOutFolder: headerFolder(cpp.out_folder, cpp.header_out_folder),
      includePrefix: cpp.include_prefix,
      namespace: cpp.namespace,
      identStyle: overrideStyles('cpp.ident_style', CPP_DEFAULT_STYLE, styleExamples(cpp.ident_style)),
      fileIdentStyle: resolveStyleExample('cpp.file_ident_style', cpp.file_ident_style),
      headerExt: cpp.header_ext,
      optionalTemplate: cpp.optional_template,
      optionalHeader: cpp.optional_header,
      enumHashWorkaround: cpp.enum_hash_workaround,
    },
    java: {
      outFolder: folder(java.out_folder),
      package: java.package,
      identStyle: overrideStyles('java.ident_style', JAVA_DEFAULT_STYLE, styleExamples(java.ident_style)),
    },
    jni: {
      outFolder: folder(jni.out_folder),
      headerOutFolder: headerFolder(jni.out_folder, jni.header_out_folder),
      includePrefix: jni.include_prefix,
      includeCppPrefix: jni.include_cpp_prefix,
      namespace: jni.namespace,
      classIdentStyle: resolveStyleExample('jni.class_ident_style', jni.class_ident_style),
      fileIdentStyle: resolveStyleExample('jni.file_ident_style', jni.file_ident_style),
    },
    objc: {
      outFolder: folder(objc.out_folder),
      headerOutFolder: headerFolder(objc.out_folder, objc.header_out_folder),
      identStyle: overrideStyles('objc.ident_style', OBJC_DEFAULT_STYLE, styleExamples(objc.ident_style)),
      fileIdentStyle: resolveStyleExample('objc.file_ident_style', objc.file_ident_style),
      includePrefix: objc.include_prefix,
      headerExt: objc.header_ext,
      swiftBridgingHeaderName: objc.swift_bridging_header_name,
      closedEnums: objc.closed_enums,
    },
    objcpp: {
      outFolder: folder(objcpp.out_folder),
      headerOutFolder: headerFolder(objcpp.out_folder, objcpp.header_out_folder),
      ext: objcpp.ext,
      includePrefix: objcpp.include_prefix,
      includeCppPrefix: objcpp.include_cpp_prefix,
      includeObjcPrefix: objcpp.include_objc_prefix,
      namespace: objcpp.namespace,
    },
    cppCli: {
      outFolder: folder(cppCli.out_folder),
      identStyle: overrideStyles('cpp_cli.ident_style', CPP_CLI_DEFAULT_STYLE, styleExamples(cppCli.ident_style)),
      namespace: cppCli.namespace,
      includeCppPrefix: cppCli.include_cpp_prefix,
    },
    yaml: {
      outFolder: folder(yaml.out_folder),
      outFile: yaml.out_file,
      prefix: yaml.prefix,
    },
    python: {
      outFolder: folder(python.out_folder),
      identStyle: overrideStyles('python.ident_style', PYTHON_DEFAULT_STYLE, styleExamples(python.ident_style)),
      importPrefix: python.import_prefix,
    },
    cWrapper: {
      outFolder: folder(cWrapper.out_folder),
      headerOutFolder: headerFolder(cWrapper.out_folder, cWrapper.header_out_folder),
      includePrefix: cWrapper.include_prefix,
      includeCppPrefix: cWrapper.include_cpp_prefix,
    },
    cffi: {
      outFolder: folder(cffi.out_folder),
      packageName: cffi.package_name,
      dynamicLibList: cffi.dynamic_lib_list,
    },
  };

  return deepFreeze(config);
}
