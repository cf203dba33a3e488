/**
 * @fileoverview AutowirePass - fills constructor arguments from types
 *
 * @packageDocumentation
 * @module armature/infrastructure/di/compiler
 *
 * For every autowired definition with a class and no factory, each
 * constructor parameter without an explicit argument is bound to the one
 * service providing its declared type:
 *
 * ```
 * parameter type T
 *   ├─ definition or alias with id T.name ....... Reference(T.name)
 *   ├─ exactly one candidate ..................... Reference(candidate)
 *   ├─ several candidates ........................ AutowireError (ambiguous)
 *   └─ none
 *       ├─ default value ......................... left unsupplied
 *       ├─ @Optional() ........................... null
 *       └─ otherwise ............................. AutowireError
 * ```
 */

import { AutowireError, Reference, typeName } from '../../../domain';
import type { ServiceId } from '../../../domain';
import { consoleLogger } from '../../../application';
import type {
  IClassReflector,
  ICompilerPass,
  IContainerBuilder,
  ILogger,
  ITypeRegistry,
  ParameterMetadata,
} from '../../../application';
import { DefinitionTypeRegistry, MetadataReflector } from '../../reflection';

export interface AutowirePassOptions {
  /** Constructor introspection (default: MetadataReflector) */
  reflector?: IClassReflector;

  /** Candidate lookup (default: a DefinitionTypeRegistry over the builder) */
  createRegistry?: (builder: IContainerBuilder, reflector: IClassReflector) => ITypeRegistry;

  logger?: ILogger;
  debug?: boolean;
}

export class AutowirePass implements ICompilerPass {
  private readonly reflector: IClassReflector;
  private readonly createRegistry: (builder: IContainerBuilder, reflector: IClassReflector) => ITypeRegistry;
  private readonly logger: ILogger;
  private readonly debug: boolean;

  constructor(options: AutowirePassOptions = {}) {
    this.reflector = options.reflector ?? new MetadataReflector();
    this.createRegistry =
      options.createRegistry ?? ((builder, reflector) => new DefinitionTypeRegistry(builder, reflector));
    this.logger = options.logger ?? consoleLogger;
    this.debug = options.debug ?? false;
  }

  process(builder: IContainerBuilder): void {
    const registry = this.createRegistry(builder, this.reflector);

    for (const [id, definition] of builder.getDefinitions()) {
      const serviceClass = definition.getClass();
      if (
        !definition.isAutowired() ||
        definition.isAbstract() ||
        definition.isSynthetic() ||
        !serviceClass ||
        definition.getFactory()
      ) {
        continue;
      }

      for (const parameter of this.reflector.getConstructorParameters(serviceClass)) {
        if (definition.getArgument(parameter.index) !== undefined) {
          continue;
        }
        const value = this.autowire(builder, registry, id, parameter);
        if (value !== undefined) {
          definition.setArgument(parameter.index, value);
          if (this.debug) {
            this.logger.debug(`Autowired ${id} argument "${parameter.name}" -> ${String(value)}`);
          }
        }
      }
    }
  }

  private autowire(
    builder: IContainerBuilder,
    registry: ITypeRegistry,
    id: ServiceId,
    parameter: ParameterMetadata,
  ): Reference | null | undefined {
    if (parameter.type === undefined) {
      if (parameter.hasDefault) {
        return undefined;
      }
      throw new AutowireError(id, `argument "${parameter.name}" has no type and no default value`);
    }

    const name = typeName(parameter.type);
    if (name !== id && (builder.hasAlias(name) || (builder.hasDefinition(name) && !builder.getDefinition(name).isAbstract()))) {
      return new Reference(name);
    }

    const candidates = registry.resolveCandidatesFor(parameter.type, id);
    if (candidates.length === 1) {
      return new Reference(candidates[0]);
    }
    if (candidates.length > 1) {
      throw new AutowireError(
        id,
        `argument "${parameter.name}": ambiguous autowiring for type ${name}: candidates [${candidates.join(', ')}]`,
      );
    }

    if (parameter.hasDefault) {
      return undefined;
    }
    if (parameter.nullable) {
      return null;
    }
    throw new AutowireError(id, `argument "${parameter.name}": no service implements type ${name}`);
  }
}
