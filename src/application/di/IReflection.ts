/**
 * @fileoverview Reflection ports used by autowiring
 *
 * @packageDocumentation
 * @module armature/application/di
 *
 * Autowiring needs two capabilities, kept behind interfaces so the
 * algorithm does not depend on how type information is obtained:
 *
 * - {@link IClassReflector}: what a constructor expects;
 * - {@link ITypeRegistry}: which services provide a given type.
 */

import type { AbstractClass, ServiceId, TypeRef } from '../../domain';

/**
 * One constructor parameter as seen by autowiring.
 */
export interface ParameterMetadata {
  /** Position in the constructor signature */
  readonly index: number;

  /** Source name, or `arg<index>` when it cannot be recovered */
  readonly name: string;

  /** Declared type; `undefined` for untyped, primitive or erased (interface) types */
  readonly type: TypeRef | undefined;

  /** Whether the signature provides a default value */
  readonly hasDefault: boolean;

  /** Whether `null` is an acceptable value */
  readonly nullable: boolean;
}

/**
 * Type introspection of service classes.
 */
export interface IClassReflector {
  /**
   * Lists the constructor parameters of `serviceClass`, in order.
   */
  getConstructorParameters(serviceClass: AbstractClass): ParameterMetadata[];

  /**
   * Types `serviceClass` declares it provides beyond its own prototype
   * chain (interfaces by name, or abstract classes it implements
   * structurally).
   */
  getDeclaredTypes(serviceClass: AbstractClass): TypeRef[];
}

/**
 * Maps a type to the services able to satisfy it.
 */
export interface ITypeRegistry {
  /**
   * Ids of every non-abstract definition whose class equals, extends or
   * declares `type`, in registration order.
   *
   * @param excludeId - a service never offered as its own dependency
   */
  resolveCandidatesFor(type: TypeRef, excludeId?: ServiceId): ServiceId[];
}
