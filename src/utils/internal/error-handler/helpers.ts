/**
 * @fileoverview Helpers for inspecting thrown values of unknown shape.
 * @module src/utils/internal/error-handler/helpers
 */

/**
 * Builds a case-insensitive, non-global RegExp from a pattern.
 */
export function createSafeRegex(pattern: string | RegExp): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(pattern, 'i');
  }
  const flags = pattern.flags.replace('g', '');
  return new RegExp(pattern.source, flags.includes('i') ? flags : `${flags}i`);
}

/**
 * A descriptive name for any thrown value: the error's `name`, or a label
 * derived from the value's type.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  if (error === null) {
    return 'NullValueEncountered';
  }
  if (typeof error === 'object') {
    const ctorName = error.constructor?.name;
    return ctorName && ctorName !== 'Object'
      ? `${ctorName}Encountered`
      : 'ObjectEncountered';
  }
  return `${typeof error}Encountered`;
}

/**
 * A message string for any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === null) {
    return 'Null value encountered as error';
  }
  if (error === undefined) {
    return 'Undefined value encountered as error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object') {
    try {
      const json = JSON.stringify(error);
      if (json && json !== '{}') return json;
    } catch {
      // Circular or otherwise unserializable: described by its constructor below.
    }
    return `Non-Error object encountered (constructor: ${error.constructor?.name || 'Object'})`;
  }
  return String(error);
}
