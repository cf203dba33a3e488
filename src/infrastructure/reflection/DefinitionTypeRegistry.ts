/**
 * @fileoverview DefinitionTypeRegistry - which definitions provide a type
 *
 * @packageDocumentation
 * @module armature/infrastructure/reflection
 */

import type { AbstractClass, ServiceId, TypeRef } from '../../domain';
import type { IClassReflector, IContainerBuilder, ITypeRegistry } from '../../application';
import { classLineage } from './lineage';

/**
 * {@link ITypeRegistry} computed from the definitions of a builder.
 *
 * @remarks
 * A definition provides `type` when its class, or any class it extends, is
 * `type` (or is named `type` for string references), or when one of those
 * classes declares `type` with `@Implements()`. Abstract definitions and
 * definitions without a class never match.
 *
 * The registry reads the builder on every call, so definitions added by
 * earlier compiler passes are taken into account.
 */
export class DefinitionTypeRegistry implements ITypeRegistry {
  constructor(
    private readonly builder: IContainerBuilder,
    private readonly reflector: IClassReflector,
  ) {}

  resolveCandidatesFor(type: TypeRef, excludeId?: ServiceId): ServiceId[] {
    const candidates: ServiceId[] = [];
    for (const [id, definition] of this.builder.getDefinitions()) {
      const serviceClass = definition.getClass();
      if (id === excludeId || definition.isAbstract() || !serviceClass) {
        continue;
      }
      if (this.provides(serviceClass, type)) {
        candidates.push(id);
      }
    }
    return candidates;
  }

  private provides(serviceClass: AbstractClass, type: TypeRef): boolean {
    if (classLineage(serviceClass).some((current) => matches(current, type))) {
      return true;
    }
    return this.reflector
      .getDeclaredTypes(serviceClass)
      .some((declared) =>
        typeof declared === 'string'
          ? declared === type
          : classLineage(declared).some((current) => matches(current, type)),
      );
  }
}

function matches(candidate: AbstractClass, type: TypeRef): boolean {
  return typeof type === 'string' ? candidate.name === type : candidate === type;
}
