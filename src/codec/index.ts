export {
  averageCodeLength,
  codingEfficiency,
  decode,
  encode,
  invertCodec,
  isPrefixFree,
  kraftSum,
} from './prefix-codec';
