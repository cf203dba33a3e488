/**
 * @fileoverview Reference - a named pointer to another service
 *
 * @packageDocumentation
 * @module armature/domain/definition
 */

import type { ServiceId } from './types';

/**
 * What happens when a {@link Reference} points at a service that does not exist.
 *
 * @remarks
 * | Behavior | Compile time | Runtime |
 * |----------|--------------|---------|
 * | `Exception` | `MissingReferenceTargetError` | `ServiceNotFoundError` |
 * | `Null` | accepted | argument becomes `null` |
 * | `Ignore` | accepted | `null` in an argument list, element dropped from arrays, method call skipped |
 */
export enum InvalidReferenceBehavior {
  Ignore = 0,
  Exception = 1,
  Null = 2,
}

/**
 * Deferred pointer to another service, resolved when the owning service is built.
 *
 * A reference never owns its target.
 *
 * @example
 * ```typescript
 * builder
 *   .register('user.service', UserService)
 *   .setArguments([new Reference('user.repository')])
 *   .addMethodCall('setLogger', [
 *     new Reference('logger', InvalidReferenceBehavior.Ignore),
 *   ]);
 * ```
 */
export class Reference {
  constructor(
    private readonly id: ServiceId,
    private readonly invalidBehavior: InvalidReferenceBehavior = InvalidReferenceBehavior.Exception,
  ) {}

  getId(): ServiceId {
    return this.id;
  }

  getInvalidBehavior(): InvalidReferenceBehavior {
    return this.invalidBehavior;
  }

  toString(): string {
    return this.id;
  }
}
