/**
 * @fileoverview Definition - declarative blueprint of one service
 *
 * @packageDocumentation
 * @module armature/domain/definition
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A definition describes *how* to build a service: which class to
 * instantiate (or which factory to call), with which arguments, which
 * setters to call afterwards, and how the result is shared. It holds no
 * reference to the container and performs no I/O.
 *
 * ```
 * Definition
 * ├─ class        UserService
 * ├─ arguments    [Reference(user.repository), '%app.name%']
 * ├─ methodCalls  setLogger(Reference(logger))
 * ├─ tags         { 'kernel.event_listener': [{ event: 'user.created' }] }
 * └─ flags        public, shared
 * ```
 *
 * Definitions are mutable while the builder is being configured and are
 * locked by `ContainerBuilder.compile()`.
 */

import { FrozenContainerError } from '../exceptions';
import type {
  Argument,
  DefinitionChange,
  DefinitionFlags,
  FactoryRef,
  MethodCall,
  ServiceClass,
  ServiceId,
  TagAttributes,
} from './types';

const DEFAULT_FLAGS: DefinitionFlags = {
  public: true,
  shared: true,
  autowired: false,
  lazy: false,
  synthetic: false,
  abstract: false,
};

/**
 * Mutable blueprint for constructing one service.
 *
 * @remarks
 * Every setter returns the same definition so calls can be chained:
 *
 * ```typescript
 * new Definition(Mailer)
 *   .setArguments(['%mailer.transport%'])
 *   .addMethodCall('setLogger', [new Reference('logger')])
 *   .addTag('app.logger', { channel: 'mail' })
 *   .setShared(false);
 * ```
 */
export class Definition {
  private arguments: Argument[];
  private methodCalls: MethodCall[] = [];
  private tags = new Map<string, TagAttributes[]>();
  private factory: FactoryRef | undefined;
  private parent: ServiceId | undefined;
  private flags: DefinitionFlags = { ...DEFAULT_FLAGS };
  private changes = new Set<DefinitionChange>();
  private locked = false;

  constructor(
    private serviceClass?: ServiceClass,
    args: readonly Argument[] = [],
  ) {
    this.arguments = [...args];
    if (serviceClass) {
      this.changes.add('class');
    }
  }

  // ==================== Class & factory ====================

  getClass(): ServiceClass | undefined {
    return this.serviceClass;
  }

  setClass(serviceClass: ServiceClass | undefined): this {
    this.ensureNotLocked();
    this.serviceClass = serviceClass;
    this.changes.add('class');
    return this;
  }

  getFactory(): FactoryRef | undefined {
    return this.factory;
  }

  setFactory(factory: FactoryRef | undefined): this {
    this.ensureNotLocked();
    this.factory = factory;
    this.changes.add('factory');
    return this;
  }

  // ==================== Arguments ====================

  getArguments(): readonly Argument[] {
    return this.arguments;
  }

  setArguments(args: readonly Argument[]): this {
    this.ensureNotLocked();
    this.arguments = [...args];
    return this;
  }

  getArgument(index: number): Argument {
    return this.arguments[index];
  }

  /**
   * Sets the argument at `index`.
   *
   * An index past the end extends the list; the skipped positions hold
   * `undefined` and count as not supplied.
   */
  setArgument(index: number, value: Argument): this {
    this.ensureNotLocked();
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Argument index must be a non-negative integer, got ${index}.`);
    }
    while (this.arguments.length < index) {
      this.arguments.push(undefined);
    }
    this.arguments[index] = value;
    return this;
  }

  addArgument(value: Argument): this {
    this.ensureNotLocked();
    this.arguments.push(value);
    return this;
  }

  // ==================== Method calls ====================

  addMethodCall(method: string, args: readonly Argument[] = []): this {
    this.ensureNotLocked();
    if (method === '') {
      throw new RangeError('Method name cannot be empty.');
    }
    this.methodCalls.push({ method, arguments: [...args] });
    return this;
  }

  setMethodCalls(calls: readonly MethodCall[]): this {
    this.ensureNotLocked();
    this.methodCalls = [];
    for (const call of calls) {
      this.addMethodCall(call.method, call.arguments);
    }
    return this;
  }

  getMethodCalls(): readonly MethodCall[] {
    return this.methodCalls;
  }

  hasMethodCall(method: string): boolean {
    return this.methodCalls.some((call) => call.method === method);
  }

  /** Removes every call to `method`. */
  removeMethodCall(method: string): this {
    this.ensureNotLocked();
    this.methodCalls = this.methodCalls.filter((call) => call.method !== method);
    return this;
  }

  // ==================== Tags ====================

  /**
   * Appends one occurrence of `name`. A service may carry the same tag
   * several times with different attributes.
   */
  addTag(name: string, attributes: TagAttributes = {}): this {
    this.ensureNotLocked();
    const occurrences = this.tags.get(name) ?? [];
    occurrences.push({ ...attributes });
    this.tags.set(name, occurrences);
    return this;
  }

  getTags(): ReadonlyMap<string, readonly TagAttributes[]> {
    return this.tags;
  }

  /** Attribute maps of every occurrence of `name`, empty when absent. */
  getTag(name: string): readonly TagAttributes[] {
    return this.tags.get(name) ?? [];
  }

  hasTag(name: string): boolean {
    return this.tags.has(name);
  }

  clearTag(name: string): this {
    this.ensureNotLocked();
    this.tags.delete(name);
    return this;
  }

  // ==================== Flags ====================

  isPublic(): boolean {
    return this.flags.public;
  }

  setPublic(value: boolean): this {
    return this.setFlag('public', value);
  }

  isShared(): boolean {
    return this.flags.shared;
  }

  setShared(value: boolean): this {
    return this.setFlag('shared', value);
  }

  isAutowired(): boolean {
    return this.flags.autowired;
  }

  setAutowired(value: boolean): this {
    return this.setFlag('autowired', value);
  }

  isLazy(): boolean {
    return this.flags.lazy;
  }

  setLazy(value: boolean): this {
    return this.setFlag('lazy', value);
  }

  isSynthetic(): boolean {
    return this.flags.synthetic;
  }

  setSynthetic(value: boolean): this {
    return this.setFlag('synthetic', value);
  }

  isAbstract(): boolean {
    return this.flags.abstract;
  }

  setAbstract(value: boolean): this {
    return this.setFlag('abstract', value);
  }

  // ==================== Inheritance ====================

  getParent(): ServiceId | undefined {
    return this.parent;
  }

  /**
   * Uses the definition registered under `parent` as a template; merged in
   * by `ResolveParentsPass` during compilation.
   */
  setParent(parent: ServiceId | undefined): this {
    this.ensureNotLocked();
    this.parent = parent;
    return this;
  }

  /**
   * Parts of the definition that were explicitly assigned. A child
   * definition inherits every flag it did not change itself.
   */
  getChanges(): ReadonlySet<DefinitionChange> {
    return this.changes;
  }

  // ==================== Lifecycle ====================

  /**
   * Deep enough copy for compiler passes: lists and tag maps are copied,
   * argument values are shared.
   */
  clone(): Definition {
    const copy = new Definition(this.serviceClass, this.arguments);
    copy.methodCalls = this.methodCalls.map((call) => ({
      method: call.method,
      arguments: [...call.arguments],
    }));
    copy.tags = new Map(
      [...this.tags].map(([name, occurrences]) => [name, occurrences.map((attrs) => ({ ...attrs }))]),
    );
    copy.factory = this.factory;
    copy.parent = this.parent;
    copy.flags = { ...this.flags };
    copy.changes = new Set(this.changes);
    return copy;
  }

  /** Makes every setter throw `FrozenContainerError`. */
  lock(): this {
    this.locked = true;
    return this;
  }

  isLocked(): boolean {
    return this.locked;
  }

  private setFlag(flag: keyof DefinitionFlags, value: boolean): this {
    this.ensureNotLocked();
    this.flags[flag] = value;
    this.changes.add(flag);
    return this;
  }

  private ensureNotLocked(): void {
    if (this.locked) {
      throw new FrozenContainerError('Cannot modify a definition of a compiled container.');
    }
  }
}
