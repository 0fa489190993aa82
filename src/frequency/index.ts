export {
  alphabetSize,
  bigrams,
  countSymbols,
  joinBigrams,
  rankSymbols,
  totalCount,
  unigrams,
} from './frequency-model';
