/**
 * Runs every enabled backend over the declarations, in a fixed order,
 * inside one generation session.
 */
import type { TypeDecl } from '../ast/types.js';
import type { GeneratorConfig } from '../config/model.js';
import { FileEmitter } from '../emit/file-emitter.js';
import { FileManifestSink, GenerationSession } from '../emit/session.js';
import { generateDeclarations, type Backend } from '../generator/backend.js';
import { GeneratorContext } from '../generator/context.js';
import { ErrorCodes, GenerateError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { createCppBackend } from '../../backends/cpp.js';
import { createObjcBackend } from '../../backends/objc.js';
import { createSwiftBridgingHeaderBackend } from '../../backends/swift-bridging.js';
import { createYamlBackend } from '../../backends/yaml.js';

export type BackendSlotId =
  | 'cpp'
  | 'java'
  | 'jni'
  | 'objc'
  | 'objcpp'
  | 'swiftBridgingHeader'
  | 'cppCli'
  | 'yaml'
  | 'python'
  | 'cWrapper'
  | 'cffi';

export interface OutputFolder {
  /** Human-readable name used in folder errors, e.g. `C++ header`. */
  readonly name: string;
  readonly path: string;
}

export interface BackendSlot {
  readonly id: BackendSlotId;
  readonly label: string;
  enabled(config: GeneratorConfig): boolean;
  /** Folders created before the backend runs. */
  folders(config: GeneratorConfig): OutputFolder[];
}

export type BackendFactory = (ctx: GeneratorContext, idl: readonly TypeDecl[]) => Backend;

export type BackendRegistry = Partial<Readonly<Record<BackendSlotId, BackendFactory>>>;

export const DEFAULT_BACKENDS: BackendRegistry = Object.freeze({
  cpp: createCppBackend,
  objc: createObjcBackend,
  swiftBridgingHeader: createSwiftBridgingHeaderBackend,
  yaml: createYamlBackend,
});

function folderList(...entries: Array<[name: string, path: string | undefined]>): OutputFolder[] {
  const result: OutputFolder[] = [];
  for (const [name, path] of entries) {
    if (path !== undefined) result.push({ name, path });
  }
  return result;
}

function mainAndHeader(
  name: string,
  section: { readonly outFolder?: string; readonly headerOutFolder?: string }
): OutputFolder[] {
  return folderList([name, section.outFolder], [`${name} header`, section.headerOutFolder]);
}

/**
 * Backend slots in generation order. Each slot is enabled when its main
 * output folder is configured.
 */
export const BACKEND_SLOTS: readonly BackendSlot[] = [
  {
    id: 'cpp',
    label: 'C++',
    enabled: (c) => c.cpp.outFolder !== undefined,
    folders: (c) => mainAndHeader('C++', c.cpp),
  },
  {
    id: 'java',
    label: 'Java',
    enabled: (c) => c.java.outFolder !== undefined,
    folders: (c) => folderList(['Java', c.java.outFolder]),
  },
  {
    id: 'jni',
    label: 'JNI C++',
    enabled: (c) => c.jni.outFolder !== undefined,
    folders: (c) => mainAndHeader('JNI C++', c.jni),
  },
  {
    id: 'objc',
    label: 'Objective-C',
    enabled: (c) => c.objc.outFolder !== undefined,
    folders: (c) => mainAndHeader('Objective-C', c.objc),
  },
  {
    id: 'objcpp',
    label: 'Objective-C++',
    enabled: (c) => c.objcpp.outFolder !== undefined,
    folders: (c) => mainAndHeader('Objective-C++', c.objcpp),
  },
  {
    id: 'swiftBridgingHeader',
    label: 'Swift bridging header',
    enabled: (c) => c.objc.outFolder !== undefined && c.objc.swiftBridgingHeaderName !== undefined,
    folders: () => [],
  },
  {
    id: 'cppCli',
    label: 'C++/CLI',
    enabled: (c) => c.cppCli.outFolder !== undefined,
    folders: (c) => folderList(['C++/CLI', c.cppCli.outFolder]),
  },
  {
    id: 'yaml',
    label: 'YAML',
    enabled: (c) => c.yaml.outFolder !== undefined,
    folders: (c) => folderList(['YAML', c.yaml.outFolder]),
  },
  {
    id: 'python',
    label: 'Python',
    enabled: (c) => c.python.outFolder !== undefined,
    folders: (c) => folderList(['Python', c.python.outFolder]),
  },
  {
    id: 'cWrapper',
    label: 'C',
    enabled: (c) => c.cWrapper.outFolder !== undefined,
    folders: (c) => mainAndHeader('C', c.cWrapper),
  },
  {
    id: 'cffi',
    label: 'Cffi',
    enabled: (c) => c.cffi.outFolder !== undefined,
    folders: (c) => folderList(['Cffi', c.cffi.outFolder]),
  },
];

export interface GenerateOptions {
  /** Backend factories by slot; defaults to DEFAULT_BACKENDS. */
  backends?: BackendRegistry;
  /**
   * Session bounding this run; defaults to a fresh one. A configured output
   * file list is attached to it.
   */
  session?: GenerationSession;
}

/**
 * Generate every enabled target. Returns undefined on success, or the
 * message of the first GenerateError, after which nothing more is written.
 * Any other error propagates.
 */
export function generate(
  idl: readonly TypeDecl[],
  config: GeneratorConfig,
  options: GenerateOptions = {}
): string | undefined {
  const backends = options.backends ?? DEFAULT_BACKENDS;

  try {
    const session = options.session ?? new GenerationSession();
    if (config.outFileList !== undefined && !session.writesManifestTo(config.outFileList)) {
      session.addSink(new FileManifestSink(config.outFileList));
    }
    const emitter = new FileEmitter(session, { skipGeneration: config.skipGeneration });
    const ctx = new GeneratorContext(config, emitter);

    for (const slot of BACKEND_SLOTS) {
      if (!slot.enabled(config)) continue;

      const factory = backends[slot.id];
      if (factory === undefined) {
        throw new GenerateError(
          ErrorCodes.MISSING_BACKEND,
          `No ${slot.label} generator is available, but its output folder is configured.`,
          { slot: slot.id }
        );
      }

      for (const folder of slot.folders(config)) {
        emitter.createFolder(folder.name, folder.path);
      }

      log.debug(`Generating ${slot.label}...`);
      generateDeclarations(idl, factory(ctx, idl));
    }
    return undefined;
  } catch (error) {
    if (error instanceof GenerateError) {
      return error.message;
    }
    throw error;
  }
}
