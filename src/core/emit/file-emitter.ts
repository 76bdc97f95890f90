/**
 * Collision-safe creation of generated files.
 *
 * Every created path is registered in the session under its case-folded
 * canonical form, so two backends (or two declarations) can never write the
 * same file, nor two files whose names differ only in letter case.
 */
import * as fs from 'node:fs';
import {
  canonicalPath,
  ensureDirSync,
  isDirectorySync,
  joinPath,
  pathExistsSync,
  toUnixPath,
} from '../../utils/file-system.js';
import { ErrorCodes, GenerateError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { IndentWriter, type TextSink } from './indent-writer.js';
import type { GenerationSession } from './session.js';

export type WriteBody = (w: IndentWriter) => void;
export type WriterFactory = (sink: TextSink) => IndentWriter;

const defaultWriter: WriterFactory = (sink) => new IndentWriter(sink);

const FLUSH_THRESHOLD = 64 * 1024;

/** Buffers text and writes it to an open file descriptor as UTF-8. */
class FileSink implements TextSink {
  private buffer: string[] = [];
  private size = 0;

  constructor(private readonly fd: number) {}

  write(text: string): void {
    this.buffer.push(text);
    this.size += text.length;
    if (this.size >= FLUSH_THRESHOLD) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;
    const content = this.buffer.join('');
    this.buffer = [];
    this.size = 0;
    fs.writeSync(this.fd, content, null, 'utf-8');
  }
}

export interface FileEmitterOptions {
  /** Dry run: record manifest entries only. */
  skipGeneration: boolean;
}

export class FileEmitter {
  constructor(
    readonly session: GenerationSession,
    private readonly options: FileEmitterOptions
  ) {}

  get skipGeneration(): boolean {
    return this.options.skipGeneration;
  }

  /**
   * Create `folder/fileName` and write it through `body`.
   *
   * The path is recorded in the manifest even in a dry run. Outside a dry
   * run, a path already written in this session (exactly, or differing only
   * in case) is a GenerateError and nothing is opened.
   */
  createFile(folder: string, fileName: string, body: WriteBody, makeWriter: WriterFactory = defaultWriter): void {
    const file = joinPath(folder, fileName);
    this.session.claim(toUnixPath(file));

    if (this.options.skipGeneration) {
      return;
    }

    const canonical = canonicalPath(file);
    const existing = this.session.register(canonical);
    if (existing !== undefined) {
      if (existing === canonical) {
        throw new GenerateError(
          ErrorCodes.DUPLICATE_OUTPUT,
          `Refusing to write "${file}"; we already wrote a file to that path.`,
          { path: canonical }
        );
      }
      throw new GenerateError(
        ErrorCodes.CASE_COLLISION,
        `Refusing to write "${file}"; we already wrote a file to a path that is the same when lower-cased: "${existing}".`,
        { path: canonical, existing }
      );
    }

    this.writeTo(file, 'w', makeWriter, body);
  }

  /**
   * Create `folder/fileName` unless this session already registered it, in
   * which case nothing happens. For shared files several declarations ask for.
   */
  createFileOnce(folder: string, fileName: string, body: WriteBody, makeWriter: WriterFactory = defaultWriter): void {
    const file = joinPath(folder, fileName);
    if (this.session.register(canonicalPath(file)) !== undefined) {
      return;
    }

    this.session.claim(toUnixPath(file));
    if (this.options.skipGeneration) {
      return;
    }

    this.writeTo(file, 'w', makeWriter, body);
  }

  /**
   * Append to a file created earlier in this session. Bypasses the registry
   * and the manifest.
   */
  appendToFile(folder: string, fileName: string, body: WriteBody, makeWriter: WriterFactory = defaultWriter): void {
    if (this.options.skipGeneration) {
      return;
    }
    this.writeTo(joinPath(folder, fileName), 'a', makeWriter, body);
  }

  /**
   * Create an output folder and its parents. `name` describes the folder in
   * error messages ("C++ header", ...). No-op in a dry run.
   */
  createFolder(name: string, folder: string): void {
    if (this.options.skipGeneration) {
      return;
    }

    // mkdir failures are reported through the state check below
    let cause: string | undefined;
    try {
      ensureDirSync(folder);
      log.debug(`Created ${name} folder ${folder}`);
    } catch (error) {
      cause = error instanceof Error ? error.message : String(error);
    }

    if (pathExistsSync(folder)) {
      if (!isDirectorySync(folder)) {
        throw new GenerateError(
          ErrorCodes.FOLDER_BLOCKED,
          `Unable to create ${name} folder at "${folder}", there's something in the way.`,
          { folder, cause }
        );
      }
    } else {
      throw new GenerateError(
        ErrorCodes.FOLDER_CREATE_FAILED,
        `Unable to create ${name} folder at "${folder}".`,
        { folder, cause }
      );
    }
  }

  private writeTo(file: string, flags: 'w' | 'a', makeWriter: WriterFactory, body: WriteBody): void {
    let fd: number;
    try {
      fd = fs.openSync(file, flags);
    } catch (error) {
      throw new GenerateError(
        ErrorCodes.WRITE_FAILED,
        `Unable to open "${file}" for writing: ${error instanceof Error ? error.message : String(error)}`,
        { path: file }
      );
    }

    const sink = new FileSink(fd);
    try {
      body(makeWriter(sink));
    } finally {
      try {
        sink.flush();
      } finally {
        fs.closeSync(fd);
      }
    }
  }
}
