/**
 * Core types for the career companion service
 */

/**
 * Result type - simple discriminated union for error handling.
 * The error side defaults to a message string; tiers that need to tell
 * failure kinds apart carry a typed error instead.
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T, E = string>(value: T): Result<T, E> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T, E = string>(error: E): Result<T, E> => ({ ok: false, error });

/**
 * Type guard to check if result is successful
 */
export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;

/**
 * Type guard to check if result is a failure
 */
export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;

/**
 * Severity accepted by the telemetry sink
 */
export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Flat label set attached to metrics
 */
export type MetricLabels = Record<string, string>;
