export { entropy, idealCodeLength, redundancy, uniformCodeStats } from './entropy';
export type { UniformCodeStats } from './entropy';
