export { Headset } from './headset.js';
export { HeadsetSession, SessionError } from './session.js';
export { openTransport, parseTarget } from './transport.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export { createLogger, silentLogger } from './util/logger.js';
export { Channel } from './util/channel.js';
export { createHeadsetStore, followUpCommands, INITIAL_HEADSET_DATA } from './state/headset-store.js';
export { MessageType, messageTypeFromByte } from './protocol/constants.js';
export { checksum } from './protocol/checksum.js';
export {
  AncMode,
  BatteryType,
  EqualizerPreset,
  EQUALIZER_BAND_KEYS,
  encodeCommand,
  commandMessageType,
  describeCommand,
} from './protocol/command.js';
export { buildCommand, decodeFrame, escapeBytes, formatBytes, FrameError } from './protocol/framing.js';
export { FrameParser, describeParserError, describeRejectedFrame } from './protocol/frame-parser.js';
export { Codec, PayloadError, PayloadType, codecName, parsePayload } from './protocol/payload.js';
export type { HeadsetOptions, AncOptions } from './headset.js';
export type { SessionOptions, SessionErrorCode } from './session.js';
export type { Target } from './transport.js';
export type { HeadsetConfig } from './config.js';
export type { Logger, LoggerOptions } from './util/logger.js';
export type { HeadsetData, HeadsetState, HeadsetStore, EqualizerState, AncState } from './state/headset-store.js';
export type { Command, CommandKind, EqualizerBands } from './protocol/command.js';
export type { FrameMessage, ChecksumResult } from './protocol/framing.js';
export type {
  AcceptedFrame,
  FrameParserResult,
  FrameParserErrorCode,
  RejectedFrame,
} from './protocol/frame-parser.js';
export type { Payload, BatteryLevel, PayloadErrorDetail } from './protocol/payload.js';
