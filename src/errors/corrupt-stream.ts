import { EntropiaError } from './base';

export type CorruptStreamReason = 'trailing-bits' | 'invalid-digit';

/**
 * Thrown when a bitstring cannot be decoded into whole codewords.
 *
 * `position` is the index in the bitstring where the problem was found:
 * the offending character for `invalid-digit`, or where the unresolved
 * remainder starts for `trailing-bits`.
 */
export class CorruptStreamError extends EntropiaError {
  readonly code = 'CORRUPT_STREAM';

  readonly reason: CorruptStreamReason;
  readonly remainder: string;
  readonly position: number;

  constructor(reason: CorruptStreamReason, remainder: string, position: number) {
    const message =
      reason === 'trailing-bits'
        ? `Bitstring ends with unresolved bits "${remainder}" at position ${position}`
        : `Bitstring has non-binary digit ${JSON.stringify(remainder)} at position ${position}`;
    const hint =
      reason === 'trailing-bits'
        ? 'decode with the same codec that produced the bitstring'
        : "bitstrings may only contain '0' and '1'";
    super(message, hint);
    this.name = 'CorruptStreamError';
    this.reason = reason;
    this.remainder = remainder;
    this.position = position;
  }

  protected override _getTitle(): string {
    return 'corrupt stream';
  }

  protected override _getExpression(): string {
    return 'decode(bits, codec)';
  }

  protected override _getDetail(): string {
    return this.reason === 'trailing-bits'
      ? `"${this.remainder}" at position ${this.position} does not complete a codeword`
      : `${JSON.stringify(this.remainder)} at position ${this.position} is not a binary digit`;
  }
}
