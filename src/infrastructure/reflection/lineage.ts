import type { AbstractClass } from '../../domain';

/**
 * Whether `value` is a constructor (a function with a prototype object).
 * Arrow functions, methods and `Function.prototype` are not.
 */
export function isClass(value: unknown): value is AbstractClass {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}

/**
 * `serviceClass` followed by every class it extends, nearest first.
 */
export function classLineage(serviceClass: AbstractClass): AbstractClass[] {
  const lineage: AbstractClass[] = [];
  let current: unknown = serviceClass;
  while (isClass(current)) {
    lineage.push(current);
    current = Object.getPrototypeOf(current);
  }
  return lineage;
}
