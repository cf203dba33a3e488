/**
 * @fileoverview MetadataReflector - constructor introspection over reflect-metadata
 *
 * @packageDocumentation
 * @module armature/infrastructure/reflection
 *
 * ## Where each piece of information comes from
 *
 * | Information | Source |
 * |-------------|--------|
 * | declared type | `@Inject()` or `@Optional(type)` metadata, else `design:paramtypes` |
 * | default value present | `Function.length` (parameters before the first default) |
 * | nullable | `@Optional()` metadata |
 * | name | the constructor's source text |
 *
 * `design:paramtypes` reports `Object` for interfaces, unions and `any`,
 * and the wrapper constructors for primitives. Those count as "no declared
 * type". Under `strictNullChecks` that includes `T | null`, hence
 * `@Optional(T)`.
 *
 * `Function.length` stops counting at the first parameter with a default,
 * so a required parameter declared after a defaulted one is reported as
 * having a default too.
 *
 * A class without its own constructor inherits the signature of the
 * nearest ancestor that declares one.
 */

import 'reflect-metadata';
import type { AbstractClass, TypeRef } from '../../domain';
import type { IClassReflector, ParameterMetadata } from '../../application';
import { IMPLEMENTS_METADATA, INJECT_METADATA, OPTIONAL_METADATA } from './decorators';
import { classLineage, isClass } from './lineage';

const PARAM_TYPES_METADATA = 'design:paramtypes';

const UNTYPED = new Set<unknown>([Object, String, Number, Boolean, Symbol, BigInt, Array, Function]);

/**
 * {@link IClassReflector} backed by TypeScript decorator metadata.
 */
export class MetadataReflector implements IClassReflector {
  getConstructorParameters(serviceClass: AbstractClass): ParameterMetadata[] {
    const owner = this.findConstructorOwner(serviceClass);
    const paramTypes: readonly unknown[] | undefined = Reflect.getOwnMetadata(PARAM_TYPES_METADATA, owner);
    const injected: ReadonlyMap<number, TypeRef> | undefined = Reflect.getOwnMetadata(INJECT_METADATA, owner);
    const optional: ReadonlySet<number> | undefined = Reflect.getOwnMetadata(OPTIONAL_METADATA, owner);
    const names = parseConstructorParameterNames(owner) ?? [];
    const count = paramTypes?.length ?? names.length;

    const parameters: ParameterMetadata[] = [];
    for (let index = 0; index < count; index++) {
      parameters.push({
        index,
        name: names[index] || `arg${index}`,
        type: injected?.get(index) ?? toTypeRef(paramTypes?.[index]),
        hasDefault: index >= owner.length,
        nullable: optional?.has(index) ?? false,
      });
    }
    return parameters;
  }

  getDeclaredTypes(serviceClass: AbstractClass): TypeRef[] {
    const declared: TypeRef[] = [];
    for (const current of classLineage(serviceClass)) {
      const types: readonly TypeRef[] | undefined = Reflect.getOwnMetadata(IMPLEMENTS_METADATA, current);
      if (types) {
        declared.push(...types);
      }
    }
    return declared;
  }

  private findConstructorOwner(serviceClass: AbstractClass): AbstractClass {
    for (const current of classLineage(serviceClass)) {
      if (Reflect.hasOwnMetadata(PARAM_TYPES_METADATA, current) || parseConstructorParameterNames(current)) {
        return current;
      }
    }
    return serviceClass;
  }
}

function toTypeRef(declared: unknown): TypeRef | undefined {
  if (!isClass(declared) || UNTYPED.has(declared)) {
    return undefined;
  }
  return declared;
}

/**
 * Recovers parameter names from the constructor signature in the class
 * source. Returns `undefined` when the class declares no constructor.
 * Destructured parameters get no name.
 */
export function parseConstructorParameterNames(serviceClass: AbstractClass): string[] | undefined {
  const source = Function.prototype.toString.call(serviceClass);
  const start = source.startsWith('class') ? /\bconstructor\s*\(/.exec(source) : /\(/.exec(source);
  if (!start) {
    return undefined;
  }

  return splitSignature(source, start.index + start[0].length)
    .map((segment) => segment.trim().replace(/^\.\.\./, ''))
    .filter((segment) => segment !== '')
    .map((segment) => /^[A-Za-z_$][\w$]*/.exec(segment)?.[0] ?? '');
}

/**
 * Splits the parameter list opened just before `from` at its top-level
 * commas, skipping strings and comments, up to the closing parenthesis.
 */
function splitSignature(source: string, from: number): string[] {
  const segments: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let current = '';

  for (let i = from; i < source.length; i++) {
    const char = source[i];

    if (quote) {
      current += char;
      if (char === '\\' && i + 1 < source.length) {
        current += source[++i];
      } else if (char === quote) {
        quote = undefined;
      }
      continue;
    }

    if (char === '/' && source[i + 1] === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 1;
      continue;
    }
    if (char === '/' && source[i + 1] === '/') {
      const end = source.indexOf('\n', i + 2);
      i = end === -1 ? source.length : end;
      continue;
    }

    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      if (depth === 0) {
        break;
      }
      depth--;
    } else if (char === ',' && depth === 0) {
      segments.push(current);
      current = '';
      continue;
    }
    current += char;
  }

  segments.push(current);
  return segments;
}
