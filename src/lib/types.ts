/**
 * Common TypeScript type definitions
 *
 * Types that are shared between the marshaling layer, the engine
 * interface and the high-level pipeline API.
 */

/**
 * Rational number (fraction) interface.
 * Used for framerates.
 */
export interface IRational {
  /** Numerator */
  num: number;

  /** Denominator */
  den: number;
}

/**
 * Video dimension interface
 */
export interface IDimension {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;
}

/**
 * Element datatype of a decoded buffer.
 */
export type ElementType = 'uint8' | 'int8' | 'uint16' | 'int16';

/**
 * Typed array backing a decoded buffer.
 */
export type TypedArray = Uint8Array | Int8Array | Uint16Array | Int16Array;

/**
 * Maps an element type to the typed array holding it.
 */
export interface TypedArrayFor {
  uint8: Uint8Array;
  int8: Int8Array;
  uint16: Uint16Array;
  int16: Int16Array;
}

/**
 * N-dimensional view over a contiguous, row-major typed array.
 *
 * `shape` is the logical layout; `data.length` always equals the product of `shape`.
 */
export interface NDArray<T extends TypedArray = TypedArray> {
  data: T;
  shape: readonly number[];
  elementType: ElementType;
}

/**
 * Raw bytes plus timing metadata, as exchanged with the engine.
 *
 * Timing values are unsigned 64-bit nanosecond-scale integers;
 * `CLOCK_TIME_NONE` marks an unset value.
 */
export interface RawBuffer {
  data: Uint8Array;
  pts: bigint;
  dts: bigint;
  duration: bigint;
  offset: bigint;
}

/**
 * Decoded buffer handed to the application by `pop()`.
 */
export interface SampleBuffer<T extends TypedArray = TypedArray> {
  readonly data: NDArray<T>;
  readonly pts: bigint;
  readonly dts: bigint;
  readonly duration: bigint;
  readonly offset: bigint;
}
