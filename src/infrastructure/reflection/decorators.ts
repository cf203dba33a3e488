/**
 * @fileoverview Autowiring decorators
 *
 * @packageDocumentation
 * @module armature/infrastructure/reflection
 *
 * TypeScript only emits constructor parameter types (`design:paramtypes`)
 * for classes that carry a decorator, and erases interfaces entirely. These
 * decorators supply what reflection alone cannot see.
 *
 * @example
 * ```typescript
 * interface MailerInterface { send(to: string): void }
 *
 * @Injectable()
 * @Implements('MailerInterface')
 * class SmtpMailer implements MailerInterface {
 *   send(to: string): void {}
 * }
 *
 * @Injectable()
 * class Newsletter {
 *   constructor(
 *     @Inject('MailerInterface') private readonly mailer: MailerInterface,
 *     @Optional(Logger) private readonly logger: Logger | null,
 *     private readonly batchSize = 50,
 *   ) {}
 * }
 * ```
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata` in
 * tsconfig.json.
 */

import 'reflect-metadata';
import type { TypeRef } from '../../domain';

/** Explicit parameter types: `ReadonlyMap<parameterIndex, TypeRef>` */
export const INJECT_METADATA = 'armature:inject';

/** Nullable parameters: `ReadonlySet<parameterIndex>` */
export const OPTIONAL_METADATA = 'armature:optional';

/** Declared provided types: `readonly TypeRef[]` */
export const IMPLEMENTS_METADATA = 'armature:implements';

/** Marker set by `@Injectable()` */
export const INJECTABLE_METADATA = 'armature:injectable';

/**
 * Marks a class as autowirable.
 *
 * @remarks
 * Any class decorator makes the compiler emit `design:paramtypes`; this one
 * also records the intent, so a missing decorator is easy to spot.
 */
export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  };
}

/**
 * Overrides the type autowiring uses for one constructor parameter.
 *
 * @param type - a class, or the name of an interface or service id
 */
export function Inject(type: TypeRef): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: ReadonlyMap<number, TypeRef> | undefined = Reflect.getOwnMetadata(INJECT_METADATA, target);
    const types = new Map(existing);
    types.set(parameterIndex, type);
    Reflect.defineMetadata(INJECT_METADATA, types, target);
  };
}

/**
 * Lets autowiring inject `null` when no service provides the parameter type.
 *
 * @param type - the parameter type, as for {@link Inject}. Required for a
 * `T | null` parameter: under `strictNullChecks` its emitted type is `Object`.
 * An optional `param?: T` keeps its emitted type and needs none.
 */
export function Optional(type?: TypeRef): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    const existing: ReadonlySet<number> | undefined = Reflect.getOwnMetadata(OPTIONAL_METADATA, target);
    const indexes = new Set(existing);
    indexes.add(parameterIndex);
    Reflect.defineMetadata(OPTIONAL_METADATA, indexes, target);
    if (type !== undefined) {
      Inject(type)(target, propertyKey, parameterIndex);
    }
  };
}

/**
 * Declares the interfaces (by name) or abstract classes a class provides,
 * since `implements` clauses do not survive compilation.
 */
export function Implements(...types: TypeRef[]): ClassDecorator {
  return (target) => {
    const existing: readonly TypeRef[] | undefined = Reflect.getOwnMetadata(IMPLEMENTS_METADATA, target);
    Reflect.defineMetadata(IMPLEMENTS_METADATA, [...(existing ?? []), ...types], target);
  };
}
