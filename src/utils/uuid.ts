/**
 * UUID generation
 */

import { v4 as uuidv4, v7 as uuidv7 } from 'uuid';

/**
 * Generate a random UUID v4 string
 */
export function generateUUID(): string {
  return uuidv4();
}

/**
 * Generate a time-ordered UUID v7 string
 */
export function generateTimeOrderedUUID(): string {
  return uuidv7();
}
