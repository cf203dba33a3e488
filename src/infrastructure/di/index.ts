/**
 * @module armature/infrastructure/di
 * @description Service container implementation
 */

export { ContainerBuilder, createContainerBuilder } from './ContainerBuilder';
export type { ContainerBuilderOptions } from './ContainerBuilder';
export { Container, SERVICE_CONTAINER_ID } from './Container';
export type { ContainerOptions, ContainerState } from './Container';
export { PassConfig } from './PassConfig';
export { DEFAULT_MAX_ALIAS_DEPTH, resolveAlias, findTaggedServiceIds } from './graph';
export * from './compiler';
