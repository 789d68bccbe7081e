export { ByteCount } from './ByteCount';
export type { ByteCountKind } from './ByteCount';
export { DecodeBuf } from './DecodeBuf';
export { Eos } from './Eos';
export { CodecError, ErrorKind, assertCodec, isCodecError } from './errors';
export type { CodecErrorOptions, ErrorContext } from './errors';
export { LOG_CATEGORY, getCodecLogger } from './logger';
export type { Decode, DecoderStatus } from './codecs/Decode';
export { decoderStatus } from './codecs/Decode';
export type { Encode, ExactBytesEncode } from './codecs/Encode';
export { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from './codecs/Encode';
export { NumberDecoder, NumberEncoder, NumberFormats } from './codecs/NumberCodec';
export type { NumberFormat } from './codecs/NumberCodec';
export { BytesDecoder, BytesEncoder, RemainingBytesDecoder } from './codecs/BytesCodec';
export { Utf8Decoder, Utf8Encoder } from './codecs/Utf8Codec';
export { AndThen } from './combinators/AndThen';
export { Assert, Validate } from './combinators/Assert';
export { DecoderChain, EncoderChain } from './combinators/Chain';
export { Collect, arrayCollector } from './combinators/Collect';
export type { Collector } from './combinators/Collect';
export { LengthDecoder, LengthEncoder } from './combinators/Length';
export { MapDecoder, TryMapDecoder } from './combinators/Map';
export { MapErrDecoder, MapErrEncoder } from './combinators/MapErr';
export type { ErrorMapper } from './combinators/MapErr';
export { MapFrom, TryMapFrom } from './combinators/MapFrom';
export { MaxBytesDecoder, MaxBytesEncoder } from './combinators/MaxBytes';
export { OmitDecoder } from './combinators/Omit';
export { Optional } from './combinators/Optional';
export { Padding } from './combinators/Padding';
export { PreEncode } from './combinators/PreEncode';
export { Repeat } from './combinators/Repeat';
export { SkipRemaining } from './combinators/SkipRemaining';
export { Take } from './combinators/Take';
export { WithPrefix } from './combinators/WithPrefix';
export { DecodeExt, EncodeExt } from './builders';
export { decodeFromBytes, encodeAll, encodeToBytes } from './io';
export type { DecodeFromBytesOptions, EncodeToBytesOptions } from './io';
