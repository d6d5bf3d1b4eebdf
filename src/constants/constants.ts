/**
 * Unset value for timestamps, durations and offsets (u64 max).
 */
export const CLOCK_TIME_NONE = 0xffff_ffff_ffff_ffffn;

/**
 * Nanoseconds per second.
 */
export const NSECONDS_PER_SECOND = 1_000_000_000n;

/**
 * Default capacity of the sink queue.
 */
export const DEFAULT_QUEUE_SIZE = 100;

/**
 * Default time `pop()` waits for a buffer per attempt (milliseconds).
 */
export const DEFAULT_POP_TIMEOUT = 100;

/**
 * Default EOS wait and drain grace period used by `shutdown()` (milliseconds).
 */
export const DEFAULT_SHUTDOWN_TIMEOUT = 1000;

/**
 * Element factory of the sink endpoint.
 */
export const APPSINK_FACTORY = 'appsink';

/**
 * Element factory of the source endpoint.
 */
export const APPSRC_FACTORY = 'appsrc';

/**
 * Caps media type of raw video.
 */
export const VIDEO_RAW = 'video/x-raw';

/**
 * Caps media type of raw audio.
 */
export const AUDIO_RAW = 'audio/x-raw';
