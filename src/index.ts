/**
 * @fileoverview armature - service container with compiler passes and autowiring
 *
 * @packageDocumentation
 * @module armature
 *
 * ## Architecture Layers
 *
 * - **domain**: definitions, references, parameters and errors
 * - **application**: container, compiler pass, reflection and logging ports
 * - **infrastructure**: `ContainerBuilder`, `Container`, built-in passes,
 *   reflect-metadata based introspection
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { createContainerBuilder, Injectable, Reference } from 'armature-di';
 *
 * @Injectable()
 * class Mailer {
 *   constructor(private readonly transport: string) {}
 * }
 *
 * @Injectable()
 * class Newsletter {
 *   constructor(private readonly mailer: Mailer) {}
 * }
 *
 * const builder = createContainerBuilder();
 * builder.setParameter('mailer.transport', 'smtp');
 * builder.register(Mailer).setArguments(['%mailer.transport%']);
 * builder.autowire(Newsletter);
 *
 * const newsletter = builder.compile().get(Newsletter);
 * ```
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
