/**
 * @fileoverview Service Container Interfaces
 *
 * @packageDocumentation
 * @module armature/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Contracts of the two faces of the container:
 *
 * 1. **Configuration phase** ({@link IContainerBuilder}): definitions,
 *    aliases, parameters and compiler passes are registered, then
 *    `compile()` validates and freezes the graph.
 * 2. **Runtime phase** ({@link IContainer}): services are looked up by id
 *    and built on first demand.
 *
 * ```
 * ContainerBuilder ──register()/setAlias()/setParameter()──┐
 *        │                                                 │
 *        └── compile() ── passes ── freeze ──► Container ◄─┘
 *                                                │
 *                                     get(id) / has(id) / resolve(id)
 * ```
 *
 * The container is always passed explicitly. There is no process-wide
 * accessor.
 */

import type {
  AbstractClass,
  Definition,
  ParameterValue,
  ServiceClass,
  ServiceId,
  TagAttributes,
} from '../../domain';
import type { ICompilerPass, PassStage } from './ICompilerPass';

/**
 * Read side of a container.
 */
export interface IContainer {
  /**
   * Returns the service registered under `id`, building it on first use.
   *
   * @throws {ServiceNotFoundError} unknown id
   * @throws {CircularDependencyError} the service depends on itself through its constructor
   * @throws {AbstractServiceInstantiationError} `id` names an abstract definition
   */
  get(id: ServiceId): unknown;

  /**
   * Returns the service registered under the class name and checks its type.
   */
  get<T>(type: AbstractClass<T>): T;

  /**
   * Returns the service registered under `id` and checks it is a `type`.
   */
  get<T>(id: ServiceId, type: AbstractClass<T>): T;

  /**
   * Whether `id` resolves to a retrievable definition. Never instantiates.
   */
  has(id: ServiceId): boolean;

  getParameter(name: string): ParameterValue;

  hasParameter(name: string): boolean;
}

/**
 * Write side of a container: what configurators and compiler passes use.
 */
export interface IContainerBuilder extends IContainer {
  register(serviceClass: ServiceClass): Definition;
  register(id: ServiceId, serviceClass?: ServiceClass): Definition;

  /** `register()` with autowiring turned on. */
  autowire(serviceClass: ServiceClass): Definition;
  autowire(id: ServiceId, serviceClass?: ServiceClass): Definition;

  setDefinition(id: ServiceId, definition: Definition): this;
  getDefinition(id: ServiceId): Definition;
  hasDefinition(id: ServiceId): boolean;
  removeDefinition(id: ServiceId): this;
  getDefinitions(): ReadonlyMap<ServiceId, Definition>;

  setAlias(alias: ServiceId, id: ServiceId): this;
  getAlias(alias: ServiceId): ServiceId;
  hasAlias(alias: ServiceId): boolean;
  removeAlias(alias: ServiceId): this;
  getAliases(): ReadonlyMap<ServiceId, ServiceId>;

  setParameter(name: string, value: ParameterValue): this;
  getParameterNames(): string[];

  /**
   * Ids carrying `tag`, each with the attribute maps of every occurrence,
   * in registration order. Unknown tag ⇒ empty map.
   */
  findTaggedServiceIds(tag: string): Map<ServiceId, readonly TagAttributes[]>;

  addCompilerPass(pass: ICompilerPass, stage?: PassStage, priority?: number): this;

  isCompiled(): boolean;
}

/**
 * Applies a block of service configuration to a builder; the in-code
 * counterpart of a services file.
 *
 * @example
 * ```typescript
 * const mailing: ServiceConfigurator = (builder) => {
 *   builder.setParameter('mailer.transport', 'smtp');
 *   builder.register('mailer', Mailer).setArguments(['%mailer.transport%']);
 * };
 *
 * builder.configure(mailing);
 * ```
 */
export type ServiceConfigurator = (builder: IContainerBuilder) => void;
