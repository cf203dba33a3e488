/**
 * @module armature/infrastructure/reflection
 * @description Type introspection for autowiring
 */

export { MetadataReflector, parseConstructorParameterNames } from './MetadataReflector';
export { DefinitionTypeRegistry } from './DefinitionTypeRegistry';
export {
  Injectable,
  Inject,
  Optional,
  Implements,
  INJECTABLE_METADATA,
  INJECT_METADATA,
  OPTIONAL_METADATA,
  IMPLEMENTS_METADATA,
} from './decorators';
export { isClass, classLineage } from './lineage';
