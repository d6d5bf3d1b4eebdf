import { FormatError } from './error.js';

import type { ElementType, NDArray, TypedArray, TypedArrayFor } from './types.js';

/**
 * Bytes per element for each element type.
 */
export const ELEMENT_SIZE: Readonly<Record<ElementType, number>> = Object.freeze({
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
});

function allocate<E extends ElementType>(elementType: E, buffer: ArrayBuffer, length: number): TypedArrayFor[E];
function allocate(elementType: ElementType, buffer: ArrayBuffer, length: number): TypedArray {
  switch (elementType) {
    case 'uint8':
      return new Uint8Array(buffer, 0, length);
    case 'int8':
      return new Int8Array(buffer, 0, length);
    case 'uint16':
      return new Uint16Array(buffer, 0, length);
    case 'int16':
      return new Int16Array(buffer, 0, length);
  }
}

/**
 * Number of elements described by a shape.
 */
export function elementCount(shape: readonly number[]): number {
  return shape.reduce((total, dim) => total * dim, 1);
}

/**
 * Element type of a typed array.
 */
export function elementTypeOf(data: TypedArray): ElementType {
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Uint16Array) return 'uint16';
  return 'int16';
}

export function shapeEquals(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

/**
 * Drop a trailing singleton channel dimension.
 *
 * @example
 * ```typescript
 * squeezeChannels([240, 320, 1]); // [240, 320]
 * squeezeChannels([240, 320, 3]); // [240, 320, 3]
 * ```
 */
export function squeezeChannels(shape: readonly number[]): readonly number[] {
  if (shape.length > 1 && shape[shape.length - 1] === 1) {
    return shape.slice(0, -1);
  }
  return shape;
}

/**
 * Create a zero-filled array.
 *
 * @param elementType - Element datatype
 *
 * @param shape - Logical shape
 *
 * @returns New array owning its memory
 *
 * @example
 * ```typescript
 * const frame = zeros('uint8', [240, 320, 3]);
 * frame.data.fill(255);
 * ```
 */
export function zeros<E extends ElementType>(elementType: E, shape: readonly number[]): NDArray<TypedArrayFor[E]> {
  const length = elementCount(shape);
  const data = allocate(elementType, new ArrayBuffer(length * ELEMENT_SIZE[elementType]), length);
  return { data, shape: Object.freeze([...shape]), elementType };
}

/**
 * Wrap an existing typed array with a shape.
 *
 * @throws {FormatError} If the array length does not match the shape
 */
export function ndarray<T extends TypedArray>(data: T, shape: readonly number[]): NDArray<T> {
  if (data.length !== elementCount(shape)) {
    throw new FormatError(`Array of ${data.length} elements cannot have shape (${shape.join(', ')})`);
  }
  return { data, shape: Object.freeze([...shape]), elementType: elementTypeOf(data) };
}

/**
 * Reinterpret raw bytes as a typed array of the given shape.
 *
 * The bytes are copied, so the result owns its memory.
 *
 * @param bytes - Raw buffer contents
 *
 * @param elementType - Element datatype
 *
 * @param shape - Logical shape
 *
 * @returns Decoded array
 *
 * @throws {FormatError} If the byte length does not match shape and element size
 */
export function decodeBytes(bytes: Uint8Array, elementType: ElementType, shape: readonly number[]): NDArray {
  const length = elementCount(shape);
  const expected = length * ELEMENT_SIZE[elementType];
  if (bytes.byteLength !== expected) {
    throw new FormatError(`Buffer of ${bytes.byteLength} bytes does not match shape (${shape.join(', ')}) of ${elementType} (${expected} bytes)`);
  }

  const owned = new ArrayBuffer(expected);
  new Uint8Array(owned).set(bytes);
  return { data: allocate(elementType, owned, length), shape: Object.freeze([...shape]), elementType };
}

/**
 * Copy the bytes backing an array.
 */
export function encodeArray(array: NDArray): Uint8Array {
  const { data } = array;
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength).slice();
}
