export { audioFormatNames, getAudioFormatInfo, isAudioFormat, type AudioFormatInfo } from './audio-format.js';
export { Caps, makeAudioCaps, makeVideoCaps, type AudioCapsOptions, type CapsValue, type VideoCapsOptions } from './caps.js';
export { ConfigurationError, EngineError, FormatError, RawGraphError, type RawGraphErrorCode } from './error.js';
export {
  arrayShapeOf,
  decodeBuffer,
  descriptorToCaps,
  resolveAudioFormat,
  resolveFormat,
  resolveVideoFormat,
  samplesPerChannel,
  shapeOf,
  type AudioDescriptor,
  type FormatDescriptor,
  type VideoDescriptor,
} from './format-descriptor.js';
export { createLogger, getLogLevel, setLogLevel, type LogContext, type LogLevel, type Logger } from './logger.js';
export { ELEMENT_SIZE, decodeBytes, elementCount, encodeArray, ndarray, squeezeChannels, zeros } from './ndarray.js';
export { Rational, type RationalLike } from './rational.js';
export { getNumChannels, getVideoFormatInfo, isVideoFormat, videoFormatNames, type VideoFormatInfo } from './video-format.js';
export type * from './types.js';
