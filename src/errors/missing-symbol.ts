import { EntropiaError } from './base';

/**
 * Thrown by `encode` when the sequence contains symbols the codec has no
 * codeword for. Lists every missing symbol in first-seen order.
 */
export class MissingSymbolError extends EntropiaError {
  readonly code = 'MISSING_SYMBOL';

  readonly symbols: readonly string[];

  constructor(symbols: readonly string[]) {
    const listed = symbols.map((s) => JSON.stringify(s)).join(', ');
    super(
      `Missing symbols in codec: ${listed}`,
      'build the codec from counts that cover the whole sequence',
    );
    this.name = 'MissingSymbolError';
    this.symbols = symbols;
  }

  protected override _getTitle(): string {
    return 'missing symbol';
  }

  protected override _getExpression(): string {
    return 'encode(sequence, codec)';
  }

  protected override _getDetail(): string {
    return `no codeword for ${this.symbols.map((s) => JSON.stringify(s)).join(', ')}`;
  }
}
