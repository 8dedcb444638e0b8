/**
 * Constructors and combinators for three-state attributes
 */

import type { DiskError } from '../errors/index.js';
import type { AbsentAttr, Attr, FailedAttr } from '../types/disk.js';

export const absent: AbsentAttr = Object.freeze({ state: 'absent' });

export function present<T>(value: T): Attr<T> {
  return { state: 'present', value };
}

export function failed(error: DiskError): FailedAttr {
  return { state: 'error', error };
}

export function attrValue<T>(attr: Attr<T>): T | undefined {
  return attr.state === 'present' ? attr.value : undefined;
}

export function mapAttr<T, U>(attr: Attr<T>, fn: (value: T) => U): Attr<U> {
  return attr.state === 'present' ? present(fn(attr.value)) : attr;
}

export function flatMapAttr<T, U>(attr: Attr<T>, fn: (value: T) => Attr<U>): Attr<U> {
  return attr.state === 'present' ? fn(attr.value) : attr;
}

/**
 * First present candidate wins. With none present, a read error outranks absence.
 */
export function firstPresent<T>(...candidates: Attr<T>[]): Attr<T> {
  let firstError: FailedAttr | undefined;
  for (const candidate of candidates) {
    if (candidate.state === 'present') {
      return candidate;
    }
    if (candidate.state === 'error' && !firstError) {
      firstError = candidate;
    }
  }
  return firstError ?? absent;
}

export function firstOf<T>(attr: Attr<readonly T[]>): Attr<T> {
  return flatMapAttr(attr, (values) => {
    const [first] = values;
    return first === undefined ? absent : present(first);
  });
}
