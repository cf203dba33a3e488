/**
 * armature - Exception Module
 *
 * Error taxonomy of the service container
 */

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
