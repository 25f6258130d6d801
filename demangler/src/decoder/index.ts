export {
  type DecodeLimits,
  type DecodeResult,
  Decoder,
  type DecoderContext,
} from "./decoder.ts";
export { archetypeName } from "./type-decoder.ts";
