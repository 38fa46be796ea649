// Domain Errors
export {
  DomainError,
  InvalidStreamNameError,
  InvalidTimestampError,
  InvalidContentTypeError,
  FrameNotFoundError,
  StorageAccessError,
  SegmentCreationError,
  TranscoderError,
} from './errors/DomainErrors.js';

// Frame types
export type { FrameTimestamp, Frame, RawFramePart } from './frame.js';
export { FRAME_TIMESTAMP_HEADER, parseFrameTimestamp } from './frame.js';

// Stream types
export type { StreamName } from './stream.js';
export { isValidStreamName } from './stream.js';

// API types
export type {
  DispatchStopReason,
  DispatchStats,
  ArchiveWriterStats,
  IngestStreamResponse,
} from './api-types.js';
