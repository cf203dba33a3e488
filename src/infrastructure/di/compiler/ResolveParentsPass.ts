/**
 * @fileoverview ResolveParentsPass - merges parent definitions into children
 *
 * @packageDocumentation
 * @module armature/infrastructure/di/compiler
 *
 * ## Merge rules
 *
 * | Part | Result |
 * |------|--------|
 * | class, factory | the child's when it set one, else the parent's |
 * | arguments | the parent's, overlaid by every child argument that is not `undefined` |
 * | method calls | the parent's, then the child's |
 * | tags | the parent's occurrences, then the child's |
 * | flags | the child's when it set them, else the parent's; `abstract` is never inherited |
 */

import { CircularDependencyError, ServiceNotFoundError } from '../../../domain';
import type { Definition, DefinitionFlags, ServiceId, TagAttributes } from '../../../domain';
import type { ICompilerPass, IContainerBuilder } from '../../../application';

type InheritedFlag = Exclude<keyof DefinitionFlags, 'abstract'>;

const INHERITED_FLAGS: readonly InheritedFlag[] = ['public', 'shared', 'autowired', 'lazy', 'synthetic'];

/**
 * Resolves `Definition.setParent()` templates, parents first.
 *
 * @throws {CircularDependencyError} a definition is its own ancestor
 * @throws {ServiceNotFoundError} a parent does not exist
 */
export class ResolveParentsPass implements ICompilerPass {
  process(builder: IContainerBuilder): void {
    const resolved = new Set<ServiceId>();

    const visit = (id: ServiceId, chain: readonly ServiceId[]): Definition => {
      const definition = builder.getDefinition(id);
      const parentId = definition.getParent();
      if (resolved.has(id) || parentId === undefined) {
        resolved.add(id);
        return definition;
      }

      if (chain.includes(parentId)) {
        throw new CircularDependencyError([...chain, parentId], 'parent');
      }
      if (!builder.hasDefinition(parentId)) {
        throw new ServiceNotFoundError(parentId, `Service "${id}" extends "${parentId}", which does not exist.`);
      }

      inherit(definition, visit(parentId, [...chain, parentId]));
      resolved.add(id);
      return definition;
    };

    for (const id of [...builder.getDefinitions().keys()]) {
      visit(id, [id]);
    }
  }
}

function inherit(child: Definition, parent: Definition): void {
  const changes = new Set(child.getChanges());

  if (!changes.has('class')) {
    child.setClass(parent.getClass());
  }
  if (!changes.has('factory')) {
    child.setFactory(parent.getFactory());
  }

  const args = [...parent.getArguments()];
  child.getArguments().forEach((value, index) => {
    if (value !== undefined) {
      args[index] = value;
    }
  });
  child.setArguments(args);

  child.setMethodCalls([...parent.getMethodCalls(), ...child.getMethodCalls()]);

  const ownTags: [string, TagAttributes[]][] = [...child.getTags()].map(([name, occurrences]) => [name, [...occurrences]]);
  for (const [name] of ownTags) {
    child.clearTag(name);
  }
  for (const [name, occurrences] of [...parent.getTags(), ...ownTags]) {
    for (const attributes of occurrences) {
      child.addTag(name, attributes);
    }
  }

  for (const flag of INHERITED_FLAGS) {
    if (!changes.has(flag)) {
      setFlag(child, flag, getFlag(parent, flag));
    }
  }

  child.setParent(undefined);
}

function getFlag(definition: Definition, flag: InheritedFlag): boolean {
  switch (flag) {
    case 'public':
      return definition.isPublic();
    case 'shared':
      return definition.isShared();
    case 'autowired':
      return definition.isAutowired();
    case 'lazy':
      return definition.isLazy();
    case 'synthetic':
      return definition.isSynthetic();
  }
}

function setFlag(definition: Definition, flag: InheritedFlag, value: boolean): void {
  switch (flag) {
    case 'public':
      definition.setPublic(value);
      break;
    case 'shared':
      definition.setShared(value);
      break;
    case 'autowired':
      definition.setAutowired(value);
      break;
    case 'lazy':
      definition.setLazy(value);
      break;
    case 'synthetic':
      definition.setSynthetic(value);
      break;
  }
}
