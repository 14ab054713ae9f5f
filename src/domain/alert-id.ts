import { v7 as uuidv7 } from 'uuid';

/** UUIDv7 string: 48-bit millisecond prefix, random suffix. Sorts chronologically. */
export type AlertId = string;

export interface IdGenerator {
  next(): AlertId;
}

export const uuidV7Generator: IdGenerator = {
  next: () => uuidv7(),
};

/** Deterministic generator for tests: `prefix-0001`, `prefix-0002`, ... */
export function sequentialIdGenerator(prefix: string = 'alert'): IdGenerator {
  let counter = 0;
  return {
    next: () => {
      counter++;
      return `${prefix}-${String(counter).padStart(4, '0')}`;
    },
  };
}
