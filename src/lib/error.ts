/**
 * Error codes carried by every error this library throws.
 */
export type RawGraphErrorCode = 'ERR_CONFIGURATION' | 'ERR_FORMAT' | 'ERR_ENGINE';

/**
 * Base class of all library errors.
 *
 * @example
 * ```typescript
 * import { RawGraphError } from 'node-rawgraph';
 *
 * try {
 *   await pipeline.push(frame);
 * } catch (error) {
 *   if (error instanceof RawGraphError) {
 *     console.error(`${error.code}: ${error.message}`);
 *   }
 * }
 * ```
 */
export class RawGraphError extends Error {
  readonly code: RawGraphErrorCode;

  constructor(code: RawGraphErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The graph is not set up for the requested operation.
 *
 * Thrown when `pop()` / `push()` are called without a wired sink / source,
 * or when a description contains more than one sink or source endpoint.
 */
export class ConfigurationError extends RawGraphError {
  constructor(message: string, options?: ErrorOptions) {
    super('ERR_CONFIGURATION', message, options);
  }
}

/**
 * A format string, enum or array shape could not be used.
 */
export class FormatError extends RawGraphError {
  constructor(message: string, options?: ErrorOptions) {
    super('ERR_FORMAT', message, options);
  }
}

/**
 * The engine reported a fatal error.
 *
 * Never thrown across the bus into application code; the pipeline logs it
 * and shuts down.
 */
export class EngineError extends RawGraphError {
  /** Engine specific error code */
  readonly engineCode: number;

  /** Extra debug text supplied by the engine, if any */
  readonly debug: string | null;

  constructor(engineCode: number, message: string, debug: string | null = null) {
    super('ERR_ENGINE', message);
    this.engineCode = engineCode;
    this.debug = debug;
  }
}
