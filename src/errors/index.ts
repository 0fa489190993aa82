/**
 * Error module - exports all entropia error types.
 */

export { EntropiaError } from './base';
export { InvalidInputError } from './invalid-input';
export { MissingSymbolError } from './missing-symbol';
export { CorruptStreamError } from './corrupt-stream';
export type { CorruptStreamReason } from './corrupt-stream';
