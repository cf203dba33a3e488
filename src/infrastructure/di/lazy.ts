/**
 * @fileoverview Lazy service proxies
 *
 * @packageDocumentation
 * @module armature/infrastructure/di
 */

import type { ServiceClass } from '../../domain';

/**
 * Creates a stand-in for a service that builds it on first use.
 *
 * @remarks
 * The proxy target inherits from the class prototype and there is no
 * `getPrototypeOf` trap, so `instanceof` answers without building the
 * service. Every other read, write or key lookup goes to the real instance.
 * Reading `then` does not build the service unless the class declares it,
 * so the proxy can be returned from an async function.
 */
export function createLazyProxy(serviceClass: ServiceClass | undefined, load: () => unknown): object {
  const target: object = Object.create(serviceClass?.prototype ?? Object.prototype);
  let loaded = false;
  let instance: object | undefined;

  const real = (): object => {
    if (!loaded) {
      const created = load();
      if ((typeof created !== 'object' && typeof created !== 'function') || created === null) {
        throw new TypeError('A lazy service must be an object.');
      }
      instance = created;
      loaded = true;
    }
    return instance ?? target;
  };

  return new Proxy(target, {
    get(_target, property) {
      if (property === 'then' && !loaded && !('then' in target)) {
        return undefined;
      }
      const service = real();
      const value: unknown = Reflect.get(service, property, service);
      if (typeof value === 'function') {
        return (...args: unknown[]) => Reflect.apply(value, service, args);
      }
      return value;
    },
    set(_target, property, value) {
      return Reflect.set(real(), property, value);
    },
    has(_target, property) {
      return Reflect.has(real(), property);
    },
    ownKeys() {
      return Reflect.ownKeys(real());
    },
    getOwnPropertyDescriptor(_target, property) {
      const descriptor = Reflect.getOwnPropertyDescriptor(real(), property);
      return descriptor && { ...descriptor, configurable: true };
    },
  });
}
