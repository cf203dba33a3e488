/**
 * @module armature/infrastructure/di/compiler
 * @description Built-in compiler passes
 */

export { ResolveParentsPass } from './ResolveParentsPass';
export { AutowirePass } from './AutowirePass';
export type { AutowirePassOptions } from './AutowirePass';
export { ResolveReferencesPass } from './ResolveReferencesPass';
