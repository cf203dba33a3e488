/**
 * @fileoverview ContainerBuilder - configuration phase of the container
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Collects definitions, aliases and parameters, runs the compiler passes and
 * produces the runtime {@link Container}.
 *
 * ## Default compiler passes
 *
 * | Pass | Stage | Priority |
 * |------|-------|----------|
 * | ResolveParentsPass | beforeOptimization | 1000 |
 * | AutowirePass | beforeOptimization | -1000 |
 * | ResolveReferencesPass | beforeRemoving | 0 |
 *
 * Passes run on a staging copy of the builder. When one throws, the error
 * propagates and the builder is left as it was.
 *
 * @example
 * ```typescript
 * const builder = createContainerBuilder();
 *
 * builder.setParameter('db.host', 'localhost');
 * builder.register('db', Database).setArguments(['%db.host%']);
 * builder.autowire(UserRepository);
 * builder.setAlias('users', 'UserRepository');
 *
 * const container = builder.compile();
 * container.get('users');
 * ```
 */

import {
  CircularDependencyError,
  ContainerError,
  Definition,
  FrozenContainerError,
  ParameterStore,
  ServiceNotFoundError,
} from '../../domain';
import type { AbstractClass, ParameterValue, ServiceClass, ServiceId, TagAttributes } from '../../domain';
import { PassStage, consoleLogger } from '../../application';
import type { IClassReflector, ICompilerPass, IContainerBuilder, ServiceConfigurator } from '../../application';
import { MetadataReflector } from '../reflection';
import { AutowirePass, ResolveParentsPass, ResolveReferencesPass } from './compiler';
import { Container, SERVICE_CONTAINER_ID } from './Container';
import type { ContainerOptions } from './Container';
import { DEFAULT_MAX_ALIAS_DEPTH, findTaggedServiceIds } from './graph';
import { PassConfig } from './PassConfig';

/**
 * Builder configuration.
 */
export interface ContainerBuilderOptions extends ContainerOptions {
  /** Constructor introspection used by autowiring (default: MetadataReflector) */
  reflector?: IClassReflector;
}

function defaultOptions(): Required<ContainerBuilderOptions> {
  return {
    logger: consoleLogger,
    debug: process.env.NODE_ENV === 'development',
    maxAliasDepth: DEFAULT_MAX_ALIAS_DEPTH,
    reflector: new MetadataReflector(),
  };
}

export class ContainerBuilder implements IContainerBuilder {
  private readonly options: Required<ContainerBuilderOptions>;
  private definitions = new Map<ServiceId, Definition>();
  private aliases = new Map<ServiceId, ServiceId>();
  private parameters = new ParameterStore();
  private synthetics = new Map<ServiceId, unknown>();
  private readonly passConfig = new PassConfig();
  private compiled: Container | undefined;
  private bootstrap: Container | undefined;

  constructor(options: ContainerBuilderOptions = {}) {
    this.options = { ...defaultOptions(), ...options };
    const { logger, debug, maxAliasDepth, reflector } = this.options;

    this.definitions.set(SERVICE_CONTAINER_ID, new Definition(Container).setSynthetic(true));

    this.passConfig.add(new ResolveParentsPass(), PassStage.BeforeOptimization, 1000);
    this.passConfig.add(new AutowirePass({ reflector, logger, debug }), PassStage.BeforeOptimization, -1000);
    this.passConfig.add(new ResolveReferencesPass(maxAliasDepth), PassStage.BeforeRemoving, 0);
  }

  // ==================== Definitions ====================

  register(serviceClass: ServiceClass): Definition;
  register(id: ServiceId, serviceClass?: ServiceClass): Definition;
  register(idOrClass: ServiceId | ServiceClass, serviceClass?: ServiceClass): Definition {
    const definition =
      typeof idOrClass === 'string' ? new Definition(serviceClass) : new Definition(idOrClass);
    this.setDefinition(typeof idOrClass === 'string' ? idOrClass : idOrClass.name, definition);
    return definition;
  }

  /**
   * Registers a service and turns autowiring on for it.
   */
  autowire(serviceClass: ServiceClass): Definition;
  autowire(id: ServiceId, serviceClass?: ServiceClass): Definition;
  autowire(idOrClass: ServiceId | ServiceClass, serviceClass?: ServiceClass): Definition {
    const definition = typeof idOrClass === 'string' ? this.register(idOrClass, serviceClass) : this.register(idOrClass);
    return definition.setAutowired(true);
  }

  /**
   * Stores `definition` under `id`. An existing definition or alias with the
   * same id is replaced, and the id moves to the end of registration order.
   */
  setDefinition(id: ServiceId, definition: Definition): this {
    this.ensureNotCompiled();
    if (this.aliases.delete(id)) {
      this.warn(`Definition "${id}" replaces an alias with the same id`);
    }
    if (this.definitions.delete(id)) {
      this.warn(`Definition "${id}" replaces an existing definition`);
    }
    this.definitions.set(id, definition);
    this.invalidate();
    return this;
  }

  getDefinition(id: ServiceId): Definition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new ServiceNotFoundError(id);
    }
    return definition;
  }

  hasDefinition(id: ServiceId): boolean {
    return this.definitions.has(id);
  }

  removeDefinition(id: ServiceId): this {
    this.ensureNotCompiled();
    this.definitions.delete(id);
    this.synthetics.delete(id);
    this.invalidate();
    return this;
  }

  getDefinitions(): ReadonlyMap<ServiceId, Definition> {
    return this.definitions;
  }

  /**
   * Injects an instance before compilation. Creates a synthetic definition
   * when `id` has none; the instance is carried into the compiled container.
   *
   * @throws {ContainerError} `id` has a definition that is not synthetic
   */
  set(id: ServiceId, instance: unknown): this {
    this.ensureNotCompiled();
    const definition = this.definitions.get(id);
    if (!definition) {
      this.setDefinition(id, new Definition().setSynthetic(true));
    } else if (!definition.isSynthetic()) {
      throw new ContainerError(`Service "${id}" is not synthetic and cannot be set.`);
    }
    this.synthetics.set(id, instance);
    this.bootstrap?.setSynthetic(id, instance);
    return this;
  }

  // ==================== Aliases ====================

  /**
   * @throws {CircularDependencyError} `alias` equals `id`
   */
  setAlias(alias: ServiceId, id: ServiceId): this {
    this.ensureNotCompiled();
    if (alias === id) {
      throw new CircularDependencyError([alias, id], 'alias');
    }
    if (this.definitions.delete(alias)) {
      this.warn(`Alias "${alias}" replaces a definition with the same id`);
    }
    this.aliases.set(alias, id);
    this.invalidate();
    return this;
  }

  getAlias(alias: ServiceId): ServiceId {
    const id = this.aliases.get(alias);
    if (id === undefined) {
      throw new ServiceNotFoundError(alias, `Alias "${alias}" does not exist.`);
    }
    return id;
  }

  hasAlias(alias: ServiceId): boolean {
    return this.aliases.has(alias);
  }

  removeAlias(alias: ServiceId): this {
    this.ensureNotCompiled();
    this.aliases.delete(alias);
    this.invalidate();
    return this;
  }

  getAliases(): ReadonlyMap<ServiceId, ServiceId> {
    return this.aliases;
  }

  // ==================== Parameters ====================

  setParameter(name: string, value: ParameterValue): this {
    this.ensureNotCompiled();
    this.parameters.set(name, value);
    this.invalidate();
    return this;
  }

  /**
   * Raw value before compilation; resolved value afterwards.
   */
  getParameter(name: string): ParameterValue {
    return this.parameters.get(name);
  }

  hasParameter(name: string): boolean {
    return this.parameters.has(name);
  }

  getParameterNames(): string[] {
    return this.parameters.getNames();
  }

  getParameterStore(): ParameterStore {
    return this.parameters;
  }

  // ==================== Queries ====================

  findTaggedServiceIds(tag: string): Map<ServiceId, readonly TagAttributes[]> {
    return findTaggedServiceIds(this.definitions, tag);
  }

  /**
   * Before compilation, builds services straight from the current
   * definitions (no compiler pass applied); registering, removing or
   * aliasing a service, or setting a parameter, drops what was built so far.
   * Afterwards, delegates to the compiled container.
   */
  get(id: ServiceId): unknown;
  get<T>(type: AbstractClass<T>): T;
  get<T>(id: ServiceId, type: AbstractClass<T>): T;
  get<T>(idOrType: ServiceId | AbstractClass<T>, type?: AbstractClass<T>): unknown {
    const container = this.runtime();
    if (typeof idOrType !== 'string') {
      return container.get(idOrType);
    }
    return type ? container.get(idOrType, type) : container.get(idOrType);
  }

  has(id: ServiceId): boolean {
    return this.runtime().has(id);
  }

  // ==================== Compilation ====================

  addCompilerPass(pass: ICompilerPass, stage: PassStage = PassStage.BeforeOptimization, priority: number = 0): this {
    this.ensureNotCompiled();
    this.passConfig.add(pass, stage, priority);
    return this;
  }

  /** Registered passes in execution order. */
  getCompilerPasses(): ICompilerPass[] {
    return this.passConfig.getPasses();
  }

  /**
   * Applies configurators in order.
   */
  configure(...configurators: ServiceConfigurator[]): this {
    for (const configurator of configurators) {
      configurator(this);
    }
    return this;
  }

  /**
   * Runs the compiler passes, freezes the graph and returns the runtime
   * container.
   *
   * @throws {FrozenContainerError} the builder was already compiled
   */
  compile(): Container {
    this.ensureNotCompiled();

    const staging = this.fork();
    for (const pass of this.passConfig.getPasses()) {
      this.log(`Running compiler pass ${pass.constructor.name}`);
      pass.process(staging);
    }
    const parameters = staging.parameters.resolve();

    this.definitions = staging.definitions;
    this.aliases = staging.aliases;
    this.synthetics = staging.synthetics;
    this.parameters = parameters;
    for (const definition of this.definitions.values()) {
      definition.lock();
    }

    const { logger, debug, maxAliasDepth } = this.options;
    this.compiled = new Container(
      { definitions: this.definitions, aliases: this.aliases, parameters, synthetics: this.synthetics },
      { logger, debug, maxAliasDepth },
    );
    this.bootstrap = undefined;
    this.log(`Compiled container with ${this.definitions.size} definitions`);
    return this.compiled;
  }

  isCompiled(): boolean {
    return this.compiled !== undefined;
  }

  /**
   * @throws {ContainerError} the builder has not been compiled
   */
  getContainer(): Container {
    if (!this.compiled) {
      throw new ContainerError('The container has not been compiled yet.');
    }
    return this.compiled;
  }

  // ==================== Internals ====================

  /**
   * Copy that compiler passes work on: definitions are cloned, passes are
   * not copied.
   */
  private fork(): ContainerBuilder {
    const staging = new ContainerBuilder(this.options);
    staging.definitions = new Map([...this.definitions].map(([id, definition]) => [id, definition.clone()]));
    staging.aliases = new Map(this.aliases);
    staging.parameters = new ParameterStore(this.parameters.all());
    staging.synthetics = new Map(this.synthetics);
    return staging;
  }

  private runtime(): Container {
    if (this.compiled) {
      return this.compiled;
    }
    if (!this.bootstrap) {
      const { logger, debug, maxAliasDepth } = this.options;
      this.bootstrap = new Container(
        {
          definitions: this.definitions,
          aliases: this.aliases,
          parameters: this.parameters,
          synthetics: this.synthetics,
        },
        { logger, debug, maxAliasDepth },
      );
    }
    return this.bootstrap;
  }

  private invalidate(): void {
    this.bootstrap = undefined;
  }

  private ensureNotCompiled(): void {
    if (this.compiled) {
      throw new FrozenContainerError();
    }
  }

  private log(message: string): void {
    if (this.options.debug) {
      this.options.logger.debug(message);
    }
  }

  private warn(message: string): void {
    if (this.options.debug) {
      this.options.logger.warn(message);
    }
  }
}

/**
 * Creates a builder with the default compiler passes.
 */
export function createContainerBuilder(options: ContainerBuilderOptions = {}): ContainerBuilder {
  return new ContainerBuilder(options);
}
