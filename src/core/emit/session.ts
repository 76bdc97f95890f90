/**
 * Generation session: the written-file registry and the output manifest
 * of one generation run.
 *
 * A session must bound exactly one run. Reusing one across independent runs
 * (separate test cases, say) reports collisions that are not real.
 */
import * as fs from 'node:fs';
import { dirname, ensureDirSync } from '../../utils/file-system.js';
import { ErrorCodes, GenerateError } from '../../utils/errors.js';

/** Receives each claimed output path as it is claimed. */
export interface ManifestSink {
  record(outputPath: string): void;
}

/**
 * Writes claimed paths to a file, one per line. The file is truncated when
 * the sink is opened. File system failures become GenerateErrors.
 */
export class FileManifestSink implements ManifestSink {
  constructor(readonly filePath: string) {
    this.write(() => {
      ensureDirSync(dirname(filePath));
      fs.writeFileSync(filePath, '', 'utf-8');
    });
  }

  record(outputPath: string): void {
    this.write(() => fs.appendFileSync(this.filePath, `${outputPath}\n`, 'utf-8'));
  }

  private write(action: () => void): void {
    try {
      action();
    } catch (error) {
      throw new GenerateError(
        ErrorCodes.WRITE_FAILED,
        `Unable to write output file list "${this.filePath}": ${error instanceof Error ? error.message : String(error)}`,
        { path: this.filePath }
      );
    }
  }
}

export interface GenerationSessionOptions {
  /** Record claimed paths in memory (`session.manifest`). */
  recordManifest?: boolean;
  /** Also stream claimed paths to this file. Implies recordManifest. */
  manifestFile?: string;
  /** Additional sinks, e.g. a build system's pipe. Implies recordManifest. */
  manifestSinks?: ManifestSink[];
}

export class GenerationSession {
  /** case-folded canonical path → canonical path as first written */
  private readonly written = new Map<string, string>();
  private readonly claimed: string[] = [];
  private readonly sinks: ManifestSink[];
  private recording: boolean;

  constructor(options: GenerationSessionOptions = {}) {
    this.sinks = [...(options.manifestSinks ?? [])];
    if (options.manifestFile !== undefined) {
      this.sinks.push(new FileManifestSink(options.manifestFile));
    }
    this.recording = options.recordManifest === true || this.sinks.length > 0;
  }

  get recordsManifest(): boolean {
    return this.recording;
  }

  /**
   * Stream later claims to `sink` as well, and turn manifest recording on.
   * Paths claimed before the call are not replayed.
   */
  addSink(sink: ManifestSink): void {
    this.sinks.push(sink);
    this.recording = true;
  }

  /** Whether a FileManifestSink for `filePath` is attached. */
  writesManifestTo(filePath: string): boolean {
    return this.sinks.some((sink) => sink instanceof FileManifestSink && sink.filePath === filePath);
  }

  /** Paths claimed so far, in claim order. Empty when manifest recording is off. */
  get manifest(): readonly string[] {
    return this.claimed;
  }

  /** Canonical paths registered so far, in registration order. */
  get writtenFiles(): readonly string[] {
    return [...this.written.values()];
  }

  /**
   * Append a path to the manifest. No-op when recording is off.
   */
  claim(outputPath: string): void {
    if (!this.recordsManifest) return;
    this.claimed.push(outputPath);
    for (const sink of this.sinks) {
      sink.record(outputPath);
    }
  }

  /**
   * Register a canonical path. Returns the previously registered path with
   * the same case-folded key, or undefined when the path is new (and now
   * registered). An existing entry is never replaced.
   */
  register(canonical: string): string | undefined {
    const key = caseFold(canonical);
    const existing = this.written.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.written.set(key, canonical);
    return undefined;
  }
}

export function caseFold(filePath: string): string {
  return filePath.toLowerCase();
}
