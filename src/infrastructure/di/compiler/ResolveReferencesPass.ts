/**
 * @fileoverview ResolveReferencesPass - validates reference targets
 *
 * @packageDocumentation
 * @module armature/infrastructure/di/compiler
 */

import { InvalidReferenceBehavior, MissingReferenceTargetError, Reference } from '../../../domain';
import type { ServiceId } from '../../../domain';
import type { ICompilerPass, IContainerBuilder } from '../../../application';
import { visitReferences } from '../arguments';
import { DEFAULT_MAX_ALIAS_DEPTH, resolveAlias } from '../graph';

/**
 * Checks that every `Exception` reference points at an existing service and
 * that every alias resolves. Changes nothing.
 *
 * @throws {MissingReferenceTargetError} a reference or alias target does not exist
 * @throws {CircularDependencyError} aliases form a cycle
 */
export class ResolveReferencesPass implements ICompilerPass {
  constructor(private readonly maxAliasDepth: number = DEFAULT_MAX_ALIAS_DEPTH) {}

  process(builder: IContainerBuilder): void {
    const aliases = builder.getAliases();
    const exists = (target: ServiceId): boolean =>
      builder.hasDefinition(aliases.has(target) ? resolveAlias(target, aliases, this.maxAliasDepth) : target);

    for (const [id, definition] of builder.getDefinitions()) {
      if (definition.isAbstract()) {
        continue;
      }

      const check = (reference: Reference): void => {
        const target = reference.getId();
        if (reference.getInvalidBehavior() === InvalidReferenceBehavior.Exception && !exists(target)) {
          throw new MissingReferenceTargetError(id, target);
        }
      };

      visitReferences(definition.getArguments(), check);
      for (const call of definition.getMethodCalls()) {
        visitReferences(call.arguments, check);
      }
      const factory = definition.getFactory();
      const owner = typeof factory === 'function' ? undefined : factory?.[0];
      if (owner instanceof Reference) {
        check(owner);
      }
    }

    for (const alias of aliases.keys()) {
      const target = resolveAlias(alias, aliases, this.maxAliasDepth);
      if (!builder.hasDefinition(target)) {
        throw new MissingReferenceTargetError(alias, target);
      }
    }
  }
}
