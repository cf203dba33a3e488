/**
 * @fileoverview Walking and materializing definition arguments
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 *
 * Arguments are arbitrary values in which {@link Reference}s and parameter
 * placeholders may appear, directly or nested in arrays and plain objects.
 */

import { Reference, isPlainObject } from '../../domain';
import type { Argument, ParameterStore } from '../../domain';

/**
 * Returned by a reference resolver for an `Ignore` reference whose target
 * does not exist.
 */
export const OMIT = Symbol('omit');

export type ReferenceResolver = (reference: Reference) => unknown;

/**
 * Calls `visit` for every reference inside `value`, depth first.
 */
export function visitReferences(value: Argument, visit: (reference: Reference) => void): void {
  if (value instanceof Reference) {
    visit(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      visitReferences(item, visit);
    }
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) {
      visitReferences(item, visit);
    }
  }
}

/**
 * Replaces references and placeholders inside `value`. Omitted references
 * drop their element from arrays and objects.
 */
export function materialize(value: Argument, resolveReference: ReferenceResolver, parameters: ParameterStore): unknown {
  if (value instanceof Reference) {
    return resolveReference(value);
  }
  if (typeof value === 'string') {
    return parameters.resolveValue(value);
  }
  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      const resolved = materialize(item, resolveReference, parameters);
      if (resolved !== OMIT) {
        items.push(resolved);
      }
    }
    return items;
  }
  if (isPlainObject(value)) {
    const entries: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const resolved = materialize(item, resolveReference, parameters);
      if (resolved !== OMIT) {
        entries[key] = resolved;
      }
    }
    return entries;
  }
  return value;
}

/**
 * Materializes constructor or factory arguments. An omitted reference
 * becomes `null` so later positions keep their index; `undefined` stays
 * `undefined` so the parameter default applies.
 */
export function materializeArguments(
  args: readonly Argument[],
  resolveReference: ReferenceResolver,
  parameters: ParameterStore,
): unknown[] {
  return args.map((arg) => {
    const resolved = materialize(arg, resolveReference, parameters);
    return resolved === OMIT ? null : resolved;
  });
}

/**
 * Materializes method call arguments. Returns `undefined` when an argument
 * is an omitted reference: the call is then skipped.
 */
export function materializeCallArguments(
  args: readonly Argument[],
  resolveReference: ReferenceResolver,
  parameters: ParameterStore,
): unknown[] | undefined {
  const resolved: unknown[] = [];
  for (const arg of args) {
    const value = materialize(arg, resolveReference, parameters);
    if (value === OMIT) {
      return undefined;
    }
    resolved.push(value);
  }
  return resolved;
}
