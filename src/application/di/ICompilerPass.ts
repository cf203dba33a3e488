/**
 * @fileoverview Compiler Pass Interface
 *
 * @packageDocumentation
 * @module armature/application/di
 *
 * A compiler pass is a validation or transformation step that runs once
 * during `ContainerBuilder.compile()`, after every definition has been
 * registered and before the graph is frozen.
 *
 * Passes are grouped by {@link PassStage}; stages run in declaration order.
 * Inside a stage, higher priority runs first and equal priorities keep
 * registration order.
 *
 * @example Collecting tagged services
 * ```typescript
 * class ReportGeneratorPass implements ICompilerPass {
 *   process(builder: IContainerBuilder): void {
 *     const registry = builder.getDefinition('report.registry');
 *     for (const [id, tags] of builder.findTaggedServiceIds('report.generator')) {
 *       for (const attributes of tags) {
 *         registry.addMethodCall('add', [attributes.format, new Reference(id)]);
 *       }
 *     }
 *   }
 * }
 *
 * builder.addCompilerPass(new ReportGeneratorPass());
 * ```
 */

import type { IContainerBuilder } from './IContainer';

/**
 * Compilation stages, in execution order.
 */
export enum PassStage {
  BeforeOptimization = 'beforeOptimization',
  Optimize = 'optimize',
  BeforeRemoving = 'beforeRemoving',
  Remove = 'remove',
  AfterRemoving = 'afterRemoving',
}

/**
 * Stage execution order.
 */
export const PASS_STAGE_ORDER: readonly PassStage[] = [
  PassStage.BeforeOptimization,
  PassStage.Optimize,
  PassStage.BeforeRemoving,
  PassStage.Remove,
  PassStage.AfterRemoving,
];

/**
 * A step run by `compile()`.
 */
export interface ICompilerPass {
  /**
   * Inspects or rewrites the definitions of `builder`. Throwing aborts the
   * whole compilation and leaves the builder untouched.
   */
  process(builder: IContainerBuilder): void;
}
