/**
 * Everything a backend needs from its run: the configuration, the file
 * emitter of the run's session, and the common file skeletons.
 */
import type { GeneratorConfig } from '../config/model.js';
import type { FileEmitter, WriteBody } from '../emit/file-emitter.js';
import type { GenerationSession } from '../emit/session.js';
import type { IndentWriter } from '../emit/indent-writer.js';
import { wrapNamespace } from './render.js';

export interface HeaderFileSpec {
  folder: string;
  fileName: string;
  /** Declaration source, named in the banner. */
  origin: string;
  /** Complete include lines, e.g. `#include <string>`. */
  includes?: readonly string[];
  /** Namespace the body is wrapped in; '' for none. */
  namespace?: string;
  /** Forward declarations written at the top of the namespace. */
  fwds?: readonly string[];
  body: WriteBody;
  /** Written after the namespace closes. */
  after?: WriteBody;
}

/**
 * Banner at the top of every generated file.
 */
export function writeAutogenerationWarning(w: IndentWriter, origin: string, commentPrefix: string = '//'): void {
  w.wl(`${commentPrefix} AUTOGENERATED FILE - DO NOT MODIFY!`);
  w.wl(`${commentPrefix} This file was generated by bridgegen from ${origin}`);
}

export class GeneratorContext {
  constructor(
    readonly config: GeneratorConfig,
    readonly emitter: FileEmitter
  ) {}

  get session(): GenerationSession {
    return this.emitter.session;
  }

  /**
   * Write a C-family header: banner, `#pragma once`, includes, then the body
   * inside its namespace.
   */
  writeHeaderFile(spec: HeaderFileSpec): void {
    const { includes = [], fwds = [], namespace = '' } = spec;
    this.emitter.createFile(spec.folder, spec.fileName, (w) => {
      writeAutogenerationWarning(w, spec.origin);
      w.wl();
      w.wl('#pragma once');
      if (includes.length > 0) {
        w.wl();
        includes.forEach((line) => w.wl(line));
      }
      w.wl();
      wrapNamespace(w, namespace, (w) => {
        if (fwds.length > 0) {
          fwds.forEach((line) => w.wl(line));
          w.wl();
        }
        spec.body(w);
      });
      spec.after?.(w);
    });
  }
}
