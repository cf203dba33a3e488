/**
 * @fileoverview Alias and tag lookups shared by the builder, the passes and
 * the runtime container.
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 */

import { CircularDependencyError, ContainerError } from '../../domain';
import type { Definition, ServiceId, TagAttributes } from '../../domain';

/** Longest alias chain followed before giving up. */
export const DEFAULT_MAX_ALIAS_DEPTH = 32;

/**
 * Follows `id` through the alias map until it reaches a non-alias id.
 *
 * @throws {CircularDependencyError} an alias is visited twice
 * @throws {ContainerError} the chain is longer than `maxDepth`
 */
export function resolveAlias(
  id: ServiceId,
  aliases: ReadonlyMap<ServiceId, ServiceId>,
  maxDepth: number = DEFAULT_MAX_ALIAS_DEPTH,
): ServiceId {
  const path = [id];
  let current = id;

  for (let next = aliases.get(current); next !== undefined; next = aliases.get(current)) {
    if (path.includes(next)) {
      throw new CircularDependencyError([...path, next], 'alias');
    }
    if (path.length > maxDepth) {
      throw new ContainerError(`Alias chain starting at "${id}" is longer than ${maxDepth}.`);
    }
    path.push(next);
    current = next;
  }

  return current;
}

/**
 * Ids carrying `tag` with the attributes of every occurrence, in
 * registration order.
 */
export function findTaggedServiceIds(
  definitions: ReadonlyMap<ServiceId, Definition>,
  tag: string,
): Map<ServiceId, readonly TagAttributes[]> {
  const tagged = new Map<ServiceId, readonly TagAttributes[]>();
  for (const [id, definition] of definitions) {
    if (definition.hasTag(tag)) {
      tagged.set(id, definition.getTag(tag));
    }
  }
  return tagged;
}
