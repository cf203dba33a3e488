/**
 * @fileoverview ParameterStore - configuration values with placeholder substitution
 *
 * @packageDocumentation
 * @module armature/domain/parameters
 *
 * Parameters are flat `name → value` pairs. Values may refer to other
 * parameters with `%name%` placeholders:
 *
 * ```typescript
 * const params = new ParameterStore({
 *   'db.host': 'localhost',
 *   'db.port': 5432,
 *   'db.dsn': 'postgres://%db.host%:%db.port%/app',
 * });
 *
 * params.resolveValue('%db.port%');  // 5432 (a number, not '5432')
 * params.resolveValue('%db.dsn%');   // 'postgres://localhost:5432/app'
 * params.resolveValue('100%%');      // '100%'
 * ```
 */

import {
  FrozenContainerError,
  InvalidParameterTypeError,
  ParameterCircularReferenceError,
  ParameterNotFoundError,
} from '../exceptions';
import { isPlainObject } from '../values';

/**
 * A value a parameter can hold.
 */
export type ParameterValue = string | number | boolean | null | ParameterValue[] | ParameterMap;

/**
 * A nested map of parameter values.
 */
export interface ParameterMap {
  [key: string]: ParameterValue;
}

/** `%%` (escaped percent sign) or `%name%` */
const PLACEHOLDER = /%%|%([^%\s]+)%/g;
const EXACT_PLACEHOLDER = /^%([^%\s]+)%$/;

/**
 * Mutable parameter registry used while the container is being built.
 */
export class ParameterStore {
  protected readonly parameters: Map<string, ParameterValue>;

  constructor(initial: Readonly<Record<string, ParameterValue>> = {}) {
    this.parameters = new Map(Object.entries(initial));
  }

  /**
   * Returns the raw (unresolved) value of a parameter.
   *
   * @throws {ParameterNotFoundError} when `name` is unknown
   */
  get(name: string): ParameterValue {
    const value = this.parameters.get(name);
    if (value === undefined) {
      throw new ParameterNotFoundError(name);
    }
    return value;
  }

  has(name: string): boolean {
    return this.parameters.has(name);
  }

  set(name: string, value: ParameterValue): void {
    this.parameters.set(name, value);
  }

  remove(name: string): void {
    this.parameters.delete(name);
  }

  getNames(): string[] {
    return [...this.parameters.keys()];
  }

  all(): Readonly<Record<string, ParameterValue>> {
    return Object.fromEntries(this.parameters);
  }

  /**
   * Substitutes placeholders inside `value`.
   *
   * @remarks
   * - a string that is exactly one placeholder yields the parameter value
   *   with its own type;
   * - placeholders embedded in a longer string are replaced textually;
   * - arrays and plain objects are resolved member by member;
   * - anything else is returned as is.
   */
  resolveValue(value: ParameterValue): ParameterValue;
  resolveValue(value: unknown): unknown;
  resolveValue(value: unknown): unknown {
    return this.resolveAny(value, []);
  }

  /**
   * Resolves every parameter and returns a read-only store of the results.
   */
  resolve(): FrozenParameterStore {
    const resolved: Record<string, ParameterValue> = {};
    for (const name of this.parameters.keys()) {
      resolved[name] = this.resolvePlaceholder(name, []);
    }
    return new FrozenParameterStore(resolved);
  }

  protected resolvePlaceholder(name: string, resolving: readonly string[]): ParameterValue {
    const start = resolving.indexOf(name);
    if (start !== -1) {
      throw new ParameterCircularReferenceError([...resolving.slice(start), name]);
    }
    return this.resolveParameter(this.get(name), [...resolving, name]);
  }

  private resolveParameter(value: ParameterValue, resolving: readonly string[]): ParameterValue {
    if (typeof value === 'string') {
      return this.resolveString(value, resolving);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.resolveParameter(item, resolving));
    }
    if (value !== null && typeof value === 'object') {
      const result: ParameterMap = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveParameter(item, resolving);
      }
      return result;
    }
    return value;
  }

  private resolveAny(value: unknown, resolving: readonly string[]): unknown {
    if (typeof value === 'string') {
      return this.resolveString(value, resolving);
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.resolveAny(item, resolving));
    }
    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveAny(item, resolving);
      }
      return result;
    }
    return value;
  }

  private resolveString(value: string, resolving: readonly string[]): ParameterValue {
    const exact = EXACT_PLACEHOLDER.exec(value);
    if (exact) {
      return this.resolvePlaceholder(exact[1], resolving);
    }

    return value.replace(PLACEHOLDER, (_match: string, name: string | undefined) => {
      if (name === undefined) {
        return '%';
      }
      const resolved = this.resolvePlaceholder(name, resolving);
      if (typeof resolved === 'string' || typeof resolved === 'number' || typeof resolved === 'boolean') {
        return String(resolved);
      }
      throw new InvalidParameterTypeError(name, describeType(resolved));
    });
  }
}

/**
 * Read-only parameters of a compiled container. Values are already fully
 * resolved, so a placeholder lookup returns them without substituting again.
 */
export class FrozenParameterStore extends ParameterStore {
  override set(name: string, _value: ParameterValue): void {
    throw new FrozenContainerError(`Cannot set parameter "${name}" on a compiled container.`);
  }

  override remove(name: string): void {
    throw new FrozenContainerError(`Cannot remove parameter "${name}" from a compiled container.`);
  }

  override resolve(): FrozenParameterStore {
    return this;
  }

  protected override resolvePlaceholder(name: string): ParameterValue {
    return this.get(name);
  }
}

function describeType(value: ParameterValue): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}
