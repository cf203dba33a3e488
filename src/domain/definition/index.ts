/**
 * armature - Definition Module
 *
 * Service blueprints and references between them
 */

export { Definition } from './Definition';
export { Reference, InvalidReferenceBehavior } from './Reference';
export { typeName } from './types';

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
} from './types';
