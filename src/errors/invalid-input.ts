import { EntropiaError } from './base';

/**
 * Thrown when an operation receives input it cannot build from, such as
 * empty counts for the Huffman builder or a codec with duplicate codewords.
 */
export class InvalidInputError extends EntropiaError {
  readonly code = 'INVALID_INPUT';

  /** Operation that rejected its input */
  readonly operation: string;

  private readonly detail: string;

  constructor(operation: string, detail: string, hint?: string) {
    super(`${operation}: ${detail}`, hint);
    this.name = 'InvalidInputError';
    this.operation = operation;
    this.detail = detail;
  }

  protected override _getTitle(): string {
    return 'invalid input';
  }

  protected override _getExpression(): string {
    return `${this.operation}(...)`;
  }

  protected override _getDetail(): string {
    return this.detail;
  }
}
