import { v7 as uuidv7 } from 'uuid';

/**
 * Session and connection ids. UUIDv7, so ids sort by creation time in logs.
 */
export function generateId(): string {
  return uuidv7();
}
