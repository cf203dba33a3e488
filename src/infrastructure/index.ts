/**
 * @fileoverview Infrastructure Layer Exports
 *
 * @packageDocumentation
 * @module armature/infrastructure
 *
 * - **di**: builder, runtime container and compiler passes
 * - **reflection**: decorator metadata and constructor introspection
 */

export * from './di';
export * from './reflection';
