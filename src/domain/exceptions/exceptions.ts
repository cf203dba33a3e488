/**
 * @fileoverview Container exception taxonomy
 *
 * @packageDocumentation
 * @module armature/domain/exceptions
 *
 * Every error raised by the container itself derives from
 * {@link ContainerError}. Errors thrown by service constructors, factories
 * and setters are never wrapped and reach the caller unchanged.
 *
 * | Error | Raised when |
 * |-------|-------------|
 * | `ServiceNotFoundError` | `get()` / `getDefinition()` for an unknown id |
 * | `ParameterNotFoundError` | unknown parameter, also during placeholder substitution |
 * | `ParameterCircularReferenceError` | a parameter resolves through itself |
 * | `InvalidParameterTypeError` | a non-scalar parameter embedded inside a string |
 * | `CircularDependencyError` | construction or alias-chain re-entry |
 * | `FrozenContainerError` | a mutation after `compile()` |
 * | `AutowireError` | ambiguous or unresolvable constructor parameter |
 * | `AbstractServiceInstantiationError` | `get()` of an abstract definition |
 * | `MissingReferenceTargetError` | an `Exception`-policy reference to a missing service |
 * | `ServiceCreationError` | the container cannot build a service as configured |
 */

/**
 * Base class of all container errors.
 */
export class ContainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContainerError';

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A service id is neither a definition, an alias nor an injected instance.
 */
export class ServiceNotFoundError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    message: string = `Service "${serviceId}" not found in container.`,
  ) {
    super(message);
    this.name = 'ServiceNotFoundError';
  }
}

/**
 * A parameter name is unknown.
 */
export class ParameterNotFoundError extends ContainerError {
  constructor(public readonly parameterName: string) {
    super(`Parameter "${parameterName}" not found in container.`);
    this.name = 'ParameterNotFoundError';
  }
}

/**
 * Parameter placeholders refer back to a parameter still being resolved.
 */
export class ParameterCircularReferenceError extends ContainerError {
  constructor(public readonly path: readonly string[]) {
    super(`Circular reference detected for parameter "${path[0]}": ${path.join(' -> ')}`);
    this.name = 'ParameterCircularReferenceError';
  }
}

/**
 * A parameter holding an array or object was embedded inside a larger string.
 */
export class InvalidParameterTypeError extends ContainerError {
  constructor(
    public readonly parameterName: string,
    actualType: string,
  ) {
    super(
      `Parameter "${parameterName}" of type ${actualType} cannot be embedded in a string; ` +
        'only strings, numbers and booleans can.',
    );
    this.name = 'InvalidParameterTypeError';
  }
}

/**
 * Re-entry into a service (or alias) that is still being resolved.
 *
 * @remarks
 * `path` holds every id from the outermost `get()` down to the id that was
 * requested again, e.g. `['controller', 'A', 'B', 'A']`.
 *
 * `dependencyGraph` renders the same path as a tree:
 * ```
 * └─ controller
 *   └─ A
 *     └─ B
 *       └─ A (CIRCULAR!)
 * ```
 */
export class CircularDependencyError extends ContainerError {
  public readonly dependencyGraph: string;

  constructor(
    public readonly path: readonly string[],
    kind: 'service' | 'alias' | 'parent' = 'service',
  ) {
    super(`Circular ${kind === 'service' ? 'dependency' : kind + ' reference'} detected: ${path.join(' -> ')}`);
    this.name = 'CircularDependencyError';
    this.dependencyGraph = buildDependencyGraph(path);
  }
}

/**
 * The builder (or a definition) was modified after `compile()`.
 */
export class FrozenContainerError extends ContainerError {
  constructor(message: string = 'Cannot modify a frozen container.') {
    super(message);
    this.name = 'FrozenContainerError';
  }
}

/**
 * Autowiring cannot decide which value to inject. A configuration defect
 * reported by `compile()`.
 */
export class AutowireError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    reason: string,
  ) {
    super(`Cannot autowire service "${serviceId}": ${reason}`);
    this.name = 'AutowireError';
  }
}

/**
 * `get()` targeted a definition that only serves as a parent template.
 */
export class AbstractServiceInstantiationError extends ContainerError {
  constructor(public readonly serviceId: string) {
    super(`Service "${serviceId}" is abstract and cannot be instantiated.`);
    this.name = 'AbstractServiceInstantiationError';
  }
}

/**
 * A reference with the `Exception` policy points at a service that does not exist.
 */
export class MissingReferenceTargetError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    public readonly targetId: string,
  ) {
    super(`Service "${serviceId}" has a dependency on non-existent service "${targetId}".`);
    this.name = 'MissingReferenceTargetError';
  }
}

/**
 * The container cannot build a service the way its definition describes it.
 */
export class ServiceCreationError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    reason: string,
  ) {
    super(`Cannot create service "${serviceId}": ${reason}`);
    this.name = 'ServiceCreationError';
  }
}

function buildDependencyGraph(path: readonly string[]): string {
  let graph = '';
  for (let i = 0; i < path.length; i++) {
    const indent = '  '.repeat(i);
    const marker = i === path.length - 1 && i > 0 ? ' (CIRCULAR!)' : '';
    graph += `${indent}└─ ${path[i]}${marker}\n`;
  }
  return graph;
}
