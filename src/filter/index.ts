export {
  entropyShift,
  removalCount,
  removeByFrequency,
  roundHalfEven,
} from './frequency-filter';
export type { EntropyShift, RemovalMode, RemovalResult } from './frequency-filter';
