/**
 * @module armature/application/di
 * @description Ports of the service container
 */

// ============================================================================
// Container Interfaces
// ============================================================================

export type { IContainer, IContainerBuilder, ServiceConfigurator } from './IContainer';

// ============================================================================
// Compiler Passes
// ============================================================================

export { PassStage, PASS_STAGE_ORDER } from './ICompilerPass';
export type { ICompilerPass } from './ICompilerPass';

// ============================================================================
// Reflection
// ============================================================================

export type { IClassReflector, ITypeRegistry, ParameterMetadata } from './IReflection';
