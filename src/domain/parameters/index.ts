/**
 * armature - Parameters Module
 */

export { ParameterStore, FrozenParameterStore } from './ParameterStore';
export type { ParameterValue, ParameterMap } from './ParameterStore';
