/**
 * @fileoverview Identifier helpers for request contexts and daemon ticks.
 * This module must not import the logger: the logger builds request contexts,
 * which use these helpers.
 * @module src/utils/security/idGenerator
 */
import { randomInt, randomUUID } from 'crypto';

const REQUEST_ID_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generates an RFC 4122 v4 UUID.
 */
export const generateUUID = (): string => randomUUID();

/**
 * Generates a short request-context id in the form `XXXXX-XXXXX`.
 */
export const generateRequestContextId = (): string => {
  const segment = (length: number): string =>
    Array.from(
      { length },
      () => REQUEST_ID_CHARSET[randomInt(REQUEST_ID_CHARSET.length)],
    ).join('');
  return `${segment(5)}-${segment(5)}`;
};
