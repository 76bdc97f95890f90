/**
 * Indentation-aware text writer used by every backend.
 */

/** Destination of written text. */
export interface TextSink {
  write(text: string): void;
}

/** Collects written text in memory. */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export const DEFAULT_INDENT = '    ';

/**
 * Writes text line by line, prefixing the current indentation to the first
 * text of every line. Blank lines carry no indentation.
 *
 * `w` and `wl` return the writer so calls chain:
 *
 *   w.w('int x').wl(' = 0;')
 */
export class IndentWriter {
  private currentIndent: string;
  private startOfLine = true;

  constructor(
    private readonly out: TextSink,
    private readonly indent: string = DEFAULT_INDENT,
    startIndent: string = ''
  ) {
    this.currentIndent = startIndent;
  }

  /** Write text without ending the line. */
  w(text: string): this {
    if (text.length === 0) return this;
    if (this.startOfLine) {
      this.out.write(this.currentIndent);
      this.startOfLine = false;
    }
    this.out.write(text);
    return this;
  }

  /** Write text (if any) and end the line. */
  wl(text: string = ''): this {
    this.w(text);
    this.out.write('\n');
    this.startOfLine = true;
    return this;
  }

  /** Write a line one level less indented than the current block. */
  wlOutdent(text: string): this {
    this.decrease();
    try {
      return this.wl(text);
    } finally {
      this.increase();
    }
  }

  /** Run `fn` one indentation level deeper. */
  nested(fn: () => void): this {
    return this.nestedN(1, fn);
  }

  /** Run `fn` `amount` indentation levels deeper. */
  nestedN(amount: number, fn: () => void): this {
    const saved = this.currentIndent;
    this.currentIndent = saved + this.indent.repeat(amount);
    try {
      fn();
    } finally {
      this.currentIndent = saved;
    }
    return this;
  }

  /** `{`, nested body, `}`. */
  braced(fn: () => void): this {
    this.wl('{');
    this.nested(fn);
    return this.wl('}');
  }

  private increase(): void {
    this.currentIndent += this.indent;
  }

  private decrease(): void {
    this.currentIndent = this.currentIndent.slice(0, Math.max(0, this.currentIndent.length - this.indent.length));
  }
}
