/**
 * @fileoverview Shared value types of the service graph
 *
 * @packageDocumentation
 * @module armature/domain/definition
 */

import type { Reference } from './Reference';

/**
 * Unique key of a service within one container.
 */
export type ServiceId = string;

/**
 * A constructable service class.
 *
 * @remarks
 * Constructor arguments are only known at runtime (they come out of the
 * argument resolver), so the parameter list stays open.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceClass<T = unknown> = new (...args: any[]) => T;

/**
 * A class or abstract class, used wherever only the type matters.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractClass<T = unknown> = abstract new (...args: any[]) => T;

/**
 * A type reference used by autowiring.
 *
 * Interfaces have no runtime representation, so they are referred to by name.
 */
export type TypeRef = AbstractClass | string;

/**
 * A single constructor, factory or method-call argument.
 *
 * @remarks
 * One of:
 * - a literal value (passed through untouched);
 * - a string containing `%param.name%` placeholders;
 * - a {@link Reference} to another service;
 * - an array or plain object whose members are themselves arguments.
 *
 * `undefined` marks a position that was not supplied. It reaches the
 * constructor as `undefined`, so the parameter's default value applies.
 */
export type Argument = unknown;

/**
 * Attributes attached to one occurrence of a tag.
 */
export type TagAttributes = Readonly<Record<string, unknown>>;

/**
 * A setter/method call executed right after instantiation.
 */
export interface MethodCall {
  readonly method: string;
  readonly arguments: readonly Argument[];
}

/**
 * A plain callable factory. Receives the resolved definition arguments.
 */
export type FactoryFunction = (...args: never[]) => unknown;

/**
 * How a service is created when it does not go through its constructor.
 *
 * - a function called with the resolved arguments;
 * - `[Reference, 'method']`: a method of another service;
 * - `[SomeClass, 'method']`: a static method.
 */
export type FactoryRef =
  | FactoryFunction
  | readonly [Reference, string]
  | readonly [AbstractClass, string];

/**
 * Boolean switches of a definition.
 */
export interface DefinitionFlags {
  public: boolean;
  shared: boolean;
  autowired: boolean;
  lazy: boolean;
  synthetic: boolean;
  abstract: boolean;
}

/**
 * Every part of a definition whose explicit assignment is tracked
 * (see {@link Definition.getChanges}).
 */
export type DefinitionChange = keyof DefinitionFlags | 'class' | 'factory';

/**
 * Returns the name autowiring uses for a type reference.
 */
export function typeName(type: TypeRef): string {
  return typeof type === 'string' ? type : type.name;
}
