/**
 * ID generation helpers using ULID
 */

import { ulid } from 'ulid';

/**
 * Generate a new machine ID
 */
export function generateMachineId(): string {
  return `fsm-${ulid()}`;
}
