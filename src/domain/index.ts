/**
 * @fileoverview Domain Layer Exports
 *
 * @packageDocumentation
 * @module armature/domain
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The service graph itself: definitions, references, parameters and the
 * errors the container raises. Nothing here knows about reflection,
 * logging or instantiation.
 */

// ============================================================================
// Definitions & References
// ============================================================================

export { Definition, Reference, InvalidReferenceBehavior, typeName } from './definition';

export type {
  ServiceId,
  ServiceClass,
  AbstractClass,
  TypeRef,
  Argument,
  TagAttributes,
  MethodCall,
  FactoryFunction,
  FactoryRef,
  DefinitionFlags,
  DefinitionChange,
} from './definition';

// ============================================================================
// Parameters
// ============================================================================

export { ParameterStore, FrozenParameterStore } from './parameters';
export type { ParameterValue, ParameterMap } from './parameters';

// ============================================================================
// Exceptions
// ============================================================================

export {
  ContainerError,
  ServiceNotFoundError,
  ParameterNotFoundError,
  ParameterCircularReferenceError,
  InvalidParameterTypeError,
  CircularDependencyError,
  FrozenContainerError,
  AutowireError,
  AbstractServiceInstantiationError,
  MissingReferenceTargetError,
  ServiceCreationError,
} from './exceptions';

export { isPlainObject } from './values';
