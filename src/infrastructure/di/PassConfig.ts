/**
 * @fileoverview PassConfig - ordered registry of compiler passes
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 */

import { PASS_STAGE_ORDER, PassStage } from '../../application';
import type { ICompilerPass } from '../../application';

interface RegisteredPass {
  readonly pass: ICompilerPass;
  readonly stage: PassStage;
  readonly priority: number;
  readonly sequence: number;
}

/**
 * Keeps compiler passes in execution order: stage order first, then
 * descending priority, then registration order.
 */
export class PassConfig {
  private readonly passes: RegisteredPass[] = [];
  private sequence = 0;

  add(pass: ICompilerPass, stage: PassStage = PassStage.BeforeOptimization, priority: number = 0): void {
    if (!Number.isFinite(priority)) {
      throw new RangeError(`Compiler pass priority must be a finite number, got ${priority}.`);
    }
    this.passes.push({ pass, stage, priority, sequence: this.sequence++ });
  }

  getPasses(): ICompilerPass[] {
    return [...this.passes].sort(compare).map((entry) => entry.pass);
  }

  getPassesFor(stage: PassStage): ICompilerPass[] {
    return this.passes
      .filter((entry) => entry.stage === stage)
      .sort(compare)
      .map((entry) => entry.pass);
  }
}

function compare(a: RegisteredPass, b: RegisteredPass): number {
  return (
    PASS_STAGE_ORDER.indexOf(a.stage) - PASS_STAGE_ORDER.indexOf(b.stage) ||
    b.priority - a.priority ||
    a.sequence - b.sequence
  );
}
