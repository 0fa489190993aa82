/**
 * Base class for every error thrown by entropia.
 *
 * `format()` renders a compiler-style diagnostic:
 *
 * ```text
 * error: missing symbol
 *   --> encode(sequence, codec)
 *    |
 *    └── no codeword for "x"
 *    |
 * help: build the codec from counts that cover the whole sequence
 * ```
 */
export class EntropiaError extends Error {
  /** Optional remediation shown on the `help:` line */
  readonly hint: string | undefined;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'EntropiaError';
    this.hint = hint;
  }

  /** Short lowercase headline; subclasses name their error kind. */
  protected _getTitle(): string {
    return this.message;
  }

  /** What the `-->` pointer shows. Defaults to the throw site. */
  protected _getExpression(): string {
    return this._getLocation();
  }

  protected _getDetail(): string {
    return this.message;
  }

  /** First stack frame outside the errors module. */
  protected _getLocation(): string {
    const frames = (this.stack ?? '').split('\n').slice(1);
    for (const frame of frames) {
      const line = frame.trim();
      if (!line.startsWith('at ') || line.includes('/src/errors/')) continue;
      const paren = line.match(/\((.*)\)$/);
      return paren?.[1] ?? line.slice(3);
    }
    return '<unknown>';
  }

  format(): string {
    const lines = [`error: ${this._getTitle()}`, `  --> ${this._getExpression()}`, '   |'];
    lines.push(`   └── ${this._getDetail()}`);
    if (this.hint) {
      lines.push('   |');
      lines.push(`help: ${this.hint}`);
    }
    return lines.join('\n');
  }
}
