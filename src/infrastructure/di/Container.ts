/**
 * @fileoverview Container - runtime service container
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Builds services from compiled definitions on first demand.
 *
 * ## Lookup steps for `get(id)`
 *
 * ```
 * get(id)
 *   1. follow aliases (bounded, cycles rejected)
 *   2. cached shared instance? → return it
 *   3. unknown / abstract / unset synthetic / private → error
 *   4. id already under construction? → CircularDependencyError
 *   5. materialize arguments (references, placeholders)
 *   6. new Class(...args) or factory(...args)
 *   7. shared → cache BEFORE method calls
 *   8. run method calls (evict the cache entry if one throws)
 * ```
 *
 * Step 7 lets two services reference each other as long as one of the two
 * links goes through a method call:
 *
 * ```typescript
 * builder.register('a', A).addMethodCall('setB', [new Reference('b')]);
 * builder.register('b', B).setArguments([new Reference('a')]);
 * ```
 *
 * ## Asynchronous construction
 *
 * `resolve(id)` follows the same steps but awaits factories and method
 * calls. Concurrent calls for the same shared id join one construction.
 * The construction chain of each call is tracked with `AsyncLocalStorage`,
 * so a cycle is reported before joining a pending construction.
 */

import { AsyncLocalStorage } from 'async_hooks';
import {
  AbstractServiceInstantiationError,
  CircularDependencyError,
  ContainerError,
  InvalidReferenceBehavior,
  Reference,
  ServiceCreationError,
  ServiceNotFoundError,
} from '../../domain';
import type {
  AbstractClass,
  Argument,
  Definition,
  FactoryFunction,
  FactoryRef,
  ParameterStore,
  ParameterValue,
  ServiceId,
  TagAttributes,
} from '../../domain';
import { consoleLogger } from '../../application';
import type { IContainer, ILogger } from '../../application';
import {
  OMIT,
  materializeArguments,
  materializeCallArguments,
  visitReferences,
} from './arguments';
import type { ReferenceResolver } from './arguments';
import { DEFAULT_MAX_ALIAS_DEPTH, findTaggedServiceIds, resolveAlias } from './graph';
import { createLazyProxy } from './lazy';

/** Id under which every container exposes itself. */
export const SERVICE_CONTAINER_ID = 'service_container';

/**
 * Container configuration.
 */
export interface ContainerOptions {
  /** Logger (default: consoleLogger) */
  logger?: ILogger;

  /** Log service construction (default: `NODE_ENV === 'development'`) */
  debug?: boolean;

  /** Longest alias chain followed (default: 32) */
  maxAliasDepth?: number;
}

/**
 * The service graph a container serves.
 */
export interface ContainerState {
  readonly definitions: ReadonlyMap<ServiceId, Definition>;
  readonly aliases: ReadonlyMap<ServiceId, ServiceId>;
  readonly parameters: ParameterStore;

  /** Instances of synthetic services set before compilation */
  readonly synthetics?: ReadonlyMap<ServiceId, unknown>;
}

function defaultOptions(): Required<ContainerOptions> {
  return {
    logger: consoleLogger,
    debug: process.env.NODE_ENV === 'development',
    maxAliasDepth: DEFAULT_MAX_ALIAS_DEPTH,
  };
}

/**
 * Runtime container created by `ContainerBuilder.compile()`.
 *
 * @example
 * ```typescript
 * const container = builder.compile();
 *
 * const mailer = container.get(Mailer);                   // typed by class
 * const legacy = container.get('mailer.legacy', Mailer);  // typed by id
 * const report = await container.resolve('report.daily'); // async factory
 * ```
 */
export class Container implements IContainer {
  private readonly options: Required<ContainerOptions>;
  private readonly definitions: ReadonlyMap<ServiceId, Definition>;
  private readonly aliases: ReadonlyMap<ServiceId, ServiceId>;
  private readonly parameters: ParameterStore;

  private readonly instances = new Map<ServiceId, unknown>();
  private readonly pending = new Map<ServiceId, Promise<unknown>>();
  private readonly accessed = new Set<ServiceId>();
  private readonly loading: ServiceId[] = [];
  private readonly chain = new AsyncLocalStorage<readonly ServiceId[]>();

  constructor(state: ContainerState, options: ContainerOptions = {}) {
    this.options = { ...defaultOptions(), ...options };
    this.definitions = state.definitions;
    this.aliases = state.aliases;
    this.parameters = state.parameters;

    for (const [id, instance] of state.synthetics ?? []) {
      this.instances.set(id, instance);
    }
    if (this.definitions.has(SERVICE_CONTAINER_ID)) {
      this.instances.set(SERVICE_CONTAINER_ID, this);
    }
  }

  // ==================== Lookup ====================

  get(id: ServiceId): unknown;
  get<T>(type: AbstractClass<T>): T;
  get<T>(id: ServiceId, type: AbstractClass<T>): T;
  get<T>(idOrType: ServiceId | AbstractClass<T>, type?: AbstractClass<T>): unknown {
    const id = typeof idOrType === 'string' ? idOrType : idOrType.name;
    const expected = typeof idOrType === 'string' ? type : idOrType;
    const service = this.getService(this.resolvePublicId(id));
    return expected ? checkType(id, service, expected) : service;
  }

  /**
   * Asynchronous counterpart of `get()`: awaits factories and method calls
   * that return promises.
   *
   * @remarks
   * Concurrent calls for the same shared service build it once. A lazy
   * service is still loaded synchronously on first access.
   */
  resolve(id: ServiceId): Promise<unknown>;
  resolve<T>(type: AbstractClass<T>): Promise<T>;
  resolve<T>(id: ServiceId, type: AbstractClass<T>): Promise<T>;
  async resolve<T>(idOrType: ServiceId | AbstractClass<T>, type?: AbstractClass<T>): Promise<unknown> {
    const id = typeof idOrType === 'string' ? idOrType : idOrType.name;
    const expected = typeof idOrType === 'string' ? type : idOrType;
    const service = await this.resolveService(this.resolvePublicId(id));
    return expected ? checkType(id, service, expected) : service;
  }

  has(id: ServiceId): boolean {
    let target = id;
    if (this.aliases.has(id)) {
      try {
        target = resolveAlias(id, this.aliases, this.options.maxAliasDepth);
      } catch (error) {
        if (error instanceof ContainerError) {
          return false;
        }
        throw error;
      }
    } else if (this.definitions.get(id)?.isPublic() === false) {
      return false;
    }
    return this.isAvailable(target);
  }

  /**
   * Whether the service has been built (or set) and is cached.
   */
  initialized(id: ServiceId): boolean {
    let target = id;
    if (this.aliases.has(id)) {
      try {
        target = resolveAlias(id, this.aliases, this.options.maxAliasDepth);
      } catch (error) {
        if (error instanceof ContainerError) {
          return false;
        }
        throw error;
      }
    }
    return this.instances.has(target) && !this.pending.has(target);
  }

  /**
   * Provides the instance of a synthetic service.
   *
   * @throws {ContainerError} `id` is not synthetic, or was already read
   */
  setSynthetic(id: ServiceId, instance: unknown): void {
    if (!this.definitions.get(id)?.isSynthetic()) {
      throw new ContainerError(`Service "${id}" is not synthetic and cannot be set.`);
    }
    if (this.accessed.has(id)) {
      throw new ContainerError(`Service "${id}" has already been read and cannot be replaced.`);
    }
    this.instances.set(id, instance);
  }

  findTaggedServiceIds(tag: string): Map<ServiceId, readonly TagAttributes[]> {
    return findTaggedServiceIds(this.definitions, tag);
  }

  // ==================== Parameters ====================

  getParameter(name: string): ParameterValue {
    return this.parameters.resolve().get(name);
  }

  hasParameter(name: string): boolean {
    return this.parameters.has(name);
  }

  getParameterNames(): string[] {
    return this.parameters.getNames();
  }

  // ==================== Synchronous construction ====================

  private getService(id: ServiceId): unknown {
    this.accessed.add(id);
    if (this.pending.has(id) && !this.isOnChain(id)) {
      throw new ServiceCreationError(id, 'it is being built by resolve(); await it instead');
    }
    if (this.instances.has(id)) {
      return this.instances.get(id);
    }

    const definition = this.requireDefinition(id);
    if (this.loading.includes(id)) {
      throw new CircularDependencyError([...this.loading, id]);
    }

    if (definition.isLazy()) {
      const proxy = createLazyProxy(definition.getClass(), () => this.build(id, definition, false));
      if (definition.isShared()) {
        this.instances.set(id, proxy);
      }
      return proxy;
    }
    return this.build(id, definition, definition.isShared());
  }

  private build(id: ServiceId, definition: Definition, cache: boolean): unknown {
    this.log(`Creating service "${id}"`);
    this.loading.push(id);
    try {
      const args = materializeArguments(definition.getArguments(), this.referenceResolver(), this.parameters);
      const instance = this.instantiate(id, definition, args);
      if (cache) {
        this.instances.set(id, instance);
      }

      try {
        for (const call of definition.getMethodCalls()) {
          const callArgs = materializeCallArguments(call.arguments, this.referenceResolver(), this.parameters);
          if (!callArgs) {
            this.log(`Skipping ${id}.${call.method}(): an ignored dependency is missing`);
            continue;
          }
          const result = findMethod(id, instance, call.method)(...callArgs);
          if (isPromiseLike(result)) {
            throw new ServiceCreationError(id, `method "${call.method}" returned a promise; use resolve()`);
          }
        }
      } catch (error) {
        if (cache) {
          this.instances.delete(id);
        }
        throw error;
      }

      return instance;
    } finally {
      this.loading.pop();
    }
  }

  private instantiate(id: ServiceId, definition: Definition, args: unknown[]): unknown {
    const factory = definition.getFactory();
    if (factory) {
      const created = this.callFactory(id, factory, args, (reference) => this.resolveReference(reference));
      if (isPromiseLike(created)) {
        throw new ServiceCreationError(id, 'the factory returned a promise; use resolve()');
      }
      return created;
    }

    const serviceClass = definition.getClass();
    if (!serviceClass) {
      throw new ServiceCreationError(id, 'the definition has neither a class nor a factory');
    }
    return new serviceClass(...args);
  }

  private resolveReference(reference: Reference): unknown {
    const target = reference.getId();
    if (!this.referenceExists(target)) {
      return missingReference(reference);
    }
    return this.getService(this.resolveAliasOf(target));
  }

  /** Whether the current construction, sync or async, is building `id`. */
  private isOnChain(id: ServiceId): boolean {
    return this.loading.includes(id) || (this.chain.getStore() ?? []).includes(id);
  }

  private referenceResolver(): ReferenceResolver {
    return (reference) => this.resolveReference(reference);
  }

  // ==================== Asynchronous construction ====================

  private async resolveService(id: ServiceId): Promise<unknown> {
    this.accessed.add(id);
    const chain = this.chain.getStore() ?? [];
    const onChain = chain.includes(id) || this.loading.includes(id);

    // Shared instances are cached before their method calls; outside the
    // building chain they are only handed out once construction settles.
    const inFlight = this.pending.get(id);
    if (inFlight && !onChain) {
      return inFlight;
    }
    if (this.instances.has(id)) {
      return this.instances.get(id);
    }

    const definition = this.requireDefinition(id);
    if (onChain) {
      throw new CircularDependencyError([...chain, id]);
    }
    if (definition.isLazy()) {
      return this.getService(id);
    }

    const construction = this.chain.run([...chain, id], () => this.buildAsync(id, definition));
    if (!definition.isShared()) {
      return construction;
    }

    this.pending.set(id, construction);
    try {
      return await construction;
    } finally {
      this.pending.delete(id);
    }
  }

  private async buildAsync(id: ServiceId, definition: Definition): Promise<unknown> {
    this.log(`Resolving service "${id}"`);
    const args = await this.materializeAsync(definition.getArguments(), materializeArguments);

    const factory = definition.getFactory();
    const serviceClass = definition.getClass();
    let instance: unknown;
    if (factory) {
      const target = typeof factory === 'function' ? undefined : await this.resolveFactoryTarget(factory);
      instance = await this.callFactory(id, factory, args, () => target);
    } else if (serviceClass) {
      instance = new serviceClass(...args);
    } else {
      throw new ServiceCreationError(id, 'the definition has neither a class nor a factory');
    }

    const shared = definition.isShared();
    if (shared) {
      this.instances.set(id, instance);
    }

    try {
      for (const call of definition.getMethodCalls()) {
        const callArgs = await this.materializeAsync(call.arguments, materializeCallArguments);
        if (!callArgs) {
          this.log(`Skipping ${id}.${call.method}(): an ignored dependency is missing`);
          continue;
        }
        await findMethod(id, instance, call.method)(...callArgs);
      }
    } catch (error) {
      if (shared) {
        this.instances.delete(id);
      }
      throw error;
    }

    return instance;
  }

  /**
   * Resolves every reference in `args` in order, then materializes them
   * with the results.
   */
  private async materializeAsync<R>(
    args: readonly Argument[],
    materializer: (args: readonly Argument[], resolver: ReferenceResolver, parameters: ParameterStore) => R,
  ): Promise<R> {
    const references: Reference[] = [];
    visitReferences(args, (reference) => references.push(reference));

    const resolved = new Map<Reference, unknown>();
    for (const reference of references) {
      if (!resolved.has(reference)) {
        resolved.set(reference, await this.resolveReferenceAsync(reference));
      }
    }
    return materializer(args, (reference) => resolved.get(reference), this.parameters);
  }

  private async resolveReferenceAsync(reference: Reference): Promise<unknown> {
    const target = reference.getId();
    if (!this.referenceExists(target)) {
      return missingReference(reference);
    }
    return this.resolveService(this.resolveAliasOf(target));
  }

  private async resolveFactoryTarget(factory: Exclude<FactoryRef, FactoryFunction>): Promise<unknown> {
    const [target] = factory;
    return target instanceof Reference ? this.resolveReferenceAsync(target) : target;
  }

  // ==================== Shared helpers ====================

  /**
   * Calls a factory. For `[Reference, method]` factories `resolveTarget`
   * supplies the service the method is called on.
   */
  private callFactory(
    id: ServiceId,
    factory: FactoryRef,
    args: unknown[],
    resolveTarget: (reference: Reference) => unknown,
  ): unknown {
    if (typeof factory === 'function') {
      return Reflect.apply(factory, undefined, args);
    }

    const [owner, method] = factory;
    const target = owner instanceof Reference ? resolveTarget(owner) : owner;
    if (target === OMIT || target === null) {
      throw new ServiceCreationError(id, `the factory service "${String(owner)}" does not exist`);
    }
    return findMethod(id, target, method)(...args);
  }

  /**
   * Alias-resolves an id requested from outside. A private service is only
   * reachable through a public alias.
   */
  private resolvePublicId(id: ServiceId): ServiceId {
    if (this.aliases.has(id)) {
      return this.resolveAliasOf(id);
    }
    if (this.definitions.get(id)?.isPublic() === false) {
      throw new ServiceNotFoundError(id, `Service "${id}" is private and can only be injected.`);
    }
    return id;
  }

  private resolveAliasOf(id: ServiceId): ServiceId {
    return resolveAlias(id, this.aliases, this.options.maxAliasDepth);
  }

  private requireDefinition(id: ServiceId): Definition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new ServiceNotFoundError(id);
    }
    if (definition.isAbstract()) {
      throw new AbstractServiceInstantiationError(id);
    }
    if (definition.isSynthetic()) {
      throw new ServiceNotFoundError(id, `Synthetic service "${id}" has not been set.`);
    }
    return definition;
  }

  private referenceExists(id: ServiceId): boolean {
    return this.isAvailable(this.aliases.has(id) ? this.resolveAliasOf(id) : id);
  }

  private isAvailable(id: ServiceId): boolean {
    const definition = this.definitions.get(id);
    if (!definition || definition.isAbstract()) {
      return false;
    }
    return !definition.isSynthetic() || this.instances.has(id);
  }

  private log(message: string): void {
    if (this.options.debug) {
      this.options.logger.debug(message);
    }
  }
}

function missingReference(reference: Reference): unknown {
  switch (reference.getInvalidBehavior()) {
    case InvalidReferenceBehavior.Ignore:
      return OMIT;
    case InvalidReferenceBehavior.Null:
      return null;
    default:
      throw new ServiceNotFoundError(reference.getId());
  }
}

function findMethod(id: ServiceId, target: unknown, method: string): (...args: unknown[]) => unknown {
  const value: unknown =
    (typeof target === 'object' && target !== null) || typeof target === 'function'
      ? Reflect.get(target, method)
      : undefined;
  if (typeof value !== 'function') {
    throw new ServiceCreationError(id, `method "${method}" does not exist`);
  }
  return (...args: unknown[]) => Reflect.apply(value, target, args);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    ((typeof value === 'object' && value !== null) || typeof value === 'function') &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

function checkType<T>(id: ServiceId, service: unknown, type: AbstractClass<T>): T {
  if (service instanceof type) {
    return service;
  }
  throw new ServiceCreationError(id, `the service is not an instance of ${type.name}`);
}
