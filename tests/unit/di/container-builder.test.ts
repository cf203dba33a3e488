/**
 * @fileoverview Unit tests for ContainerBuilder
 */

import 'reflect-metadata';

import {
  CircularDependencyError,
  Container,
  ContainerBuilder,
  ContainerError,
  createContainerBuilder,
  Definition,
  FrozenContainerError,
  ICompilerPass,
  IContainerBuilder,
  ILogger,
  MissingReferenceTargetError,
  ParameterNotFoundError,
  Reference,
  SERVICE_CONTAINER_ID,
  ServiceConfigurator,
  ServiceNotFoundError,
  silentLogger,
} from '../../../src';

class Mailer {
  readonly headers: string[] = [];

  constructor(readonly transport: string = 'sendmail') {}

  addHeader(header: string): void {
    this.headers.push(header);
  }
}

class Newsletter {
  constructor(readonly mailer: Mailer) {}
}

function createBuilder(): ContainerBuilder {
  return new ContainerBuilder({ logger: silentLogger, debug: false });
}

function createLogger(): jest.Mocked<ILogger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('ContainerBuilder', () => {
  let builder: ContainerBuilder;

  beforeEach(() => {
    builder = createBuilder();
  });

  describe('register', () => {
    it('should use the class name as id when given a class', () => {
      const definition = builder.register(Mailer);

      expect(builder.getDefinition('Mailer')).toBe(definition);
      expect(definition.getClass()).toBe(Mailer);
    });

    it('should register an id without class', () => {
      expect(builder.register('mailer').getClass()).toBeUndefined();
    });

    it('should move a re-registered id to the end of registration order', () => {
      builder.register('a', Mailer);
      builder.register('b', Mailer);
      builder.register('a', Mailer);

      expect([...builder.getDefinitions().keys()]).toEqual([SERVICE_CONTAINER_ID, 'b', 'a']);
    });

    it('should turn autowiring on with autowire()', () => {
      expect(builder.autowire('newsletter', Newsletter).isAutowired()).toBe(true);
      expect(builder.autowire(Mailer).isAutowired()).toBe(true);
      expect(builder.hasDefinition('Mailer')).toBe(true);
    });
  });

  describe('definitions', () => {
    it('should throw ServiceNotFoundError for an unknown definition', () => {
      expect(() => builder.getDefinition('nope')).toThrowErrorType(ServiceNotFoundError);
    });

    it('should remove a definition', () => {
      builder.register('mailer', Mailer);
      builder.removeDefinition('mailer');

      expect(builder.hasDefinition('mailer')).toBe(false);
    });

    it('should replace an alias with a definition of the same id', () => {
      builder.register('mailer.smtp', Mailer);
      builder.setAlias('mailer', 'mailer.smtp');
      builder.setDefinition('mailer', new Definition(Mailer));

      expect(builder.hasAlias('mailer')).toBe(false);
      expect(builder.hasDefinition('mailer')).toBe(true);
    });

    it('should warn about a replaced definition in debug mode', () => {
      const logger = createLogger();
      const verbose = new ContainerBuilder({ logger, debug: true });
      verbose.register('mailer', Mailer);
      verbose.register('mailer', Mailer);

      expect(logger.warn).toHaveBeenCalledWith('Definition "mailer" replaces an existing definition');
    });
  });

  describe('aliases', () => {
    it('should store and return aliases', () => {
      builder.setAlias('mailer', 'mailer.smtp');

      expect(builder.getAlias('mailer')).toBe('mailer.smtp');
      expect([...builder.getAliases()]).toEqual([['mailer', 'mailer.smtp']]);
    });

    it('should reject an alias to itself', () => {
      expect(() => builder.setAlias('mailer', 'mailer')).toThrowErrorType(CircularDependencyError);
    });

    it('should throw ServiceNotFoundError for an unknown alias', () => {
      expect(() => builder.getAlias('mailer')).toThrow('Alias "mailer" does not exist.');
    });

    it('should remove an alias', () => {
      builder.setAlias('mailer', 'mailer.smtp').removeAlias('mailer');

      expect(builder.hasAlias('mailer')).toBe(false);
    });
  });

  describe('parameters', () => {
    it('should return the raw value before compilation and the resolved one after', () => {
      builder.setParameter('db.host', 'localhost');
      builder.setParameter('db.url', 'postgres://%db.host%');

      expect(builder.getParameter('db.url')).toBe('postgres://%db.host%');

      builder.compile();

      expect(builder.getParameter('db.url')).toBe('postgres://localhost');
      expect(builder.getParameterNames()).toEqual(['db.host', 'db.url']);
    });

    it('should fail compilation on an unknown placeholder in a parameter', () => {
      builder.setParameter('db.url', 'postgres://%missing.key%');

      expect(() => builder.compile()).toThrowErrorType(ParameterNotFoundError);
      expect(builder.isCompiled()).toBe(false);
    });
  });

  describe('findTaggedServiceIds', () => {
    it('should return tagged services in registration order', () => {
      builder.register('report.csv', Mailer).addTag('report.generator', { format: 'csv' });
      builder.register('report.none', Mailer);
      builder.register('report.pdf', Mailer).addTag('report.generator', { format: 'pdf' });
      builder.register('report.html', Mailer).addTag('report.generator', { format: 'html' });

      const tagged = builder.findTaggedServiceIds('report.generator');

      expect([...tagged.keys()]).toEqual(['report.csv', 'report.pdf', 'report.html']);
      expect(tagged.get('report.pdf')).toEqual([{ format: 'pdf' }]);
    });

    it('should return an empty map for an unknown tag', () => {
      expect(builder.findTaggedServiceIds('unknown').size).toBe(0);
    });
  });

  describe('configure', () => {
    it('should apply configurators in order', () => {
      const transport: ServiceConfigurator = (b) => {
        b.setParameter('mailer.transport', 'smtp');
      };
      const mailer: ServiceConfigurator = (b) => {
        b.register('mailer', Mailer).setArguments(['%mailer.transport%']);
      };

      const container = builder.configure(transport, mailer).compile();

      expect(container.get('mailer', Mailer).transport).toBe('smtp');
    });
  });

  describe('get before compilation', () => {
    it('should build services from the current definitions', () => {
      builder.register('mailer', Mailer).setArguments(['smtp']);

      const mailer = builder.get('mailer', Mailer);

      expect(mailer.transport).toBe('smtp');
      expect(builder.get('mailer')).toBe(mailer);
      expect(builder.has('mailer')).toBe(true);
      expect(builder.has('nope')).toBe(false);
    });

    it('should serve the latest definition after a service is registered again', () => {
      builder.register('mailer', Mailer).setArguments(['smtp']);
      const first = builder.get('mailer', Mailer);

      builder.register('mailer', Mailer).setArguments(['sendmail']);
      const second = builder.get('mailer', Mailer);

      expect(second).not.toBe(first);
      expect(second.transport).toBe('sendmail');
    });

    it('should follow an alias moved to another service', () => {
      builder.register('mailer.smtp', Mailer).setArguments(['smtp']);
      builder.register('mailer.memory', Mailer).setArguments(['memory']);
      builder.setAlias('mailer', 'mailer.smtp');
      expect(builder.get('mailer', Mailer).transport).toBe('smtp');

      builder.setAlias('mailer', 'mailer.memory');

      expect(builder.get('mailer', Mailer).transport).toBe('memory');
    });

    it('should forget a removed service and rebuild on a changed parameter', () => {
      builder.setParameter('mailer.transport', 'smtp');
      builder.register('mailer', Mailer).setArguments(['%mailer.transport%']);
      expect(builder.get('mailer', Mailer).transport).toBe('smtp');

      builder.setParameter('mailer.transport', 'sendmail');
      expect(builder.get('mailer', Mailer).transport).toBe('sendmail');

      builder.removeDefinition('mailer');
      expect(builder.has('mailer')).toBe(false);
      expect(() => builder.get('mailer')).toThrowErrorType(ServiceNotFoundError);
    });

    it('should delegate to the compiled container afterwards', () => {
      builder.register('mailer', Mailer);
      const container = builder.compile();

      expect(builder.get('mailer')).toBe(container.get('mailer'));
    });
  });

  describe('set', () => {
    it('should carry an injected instance into the compiled container', () => {
      const mailer = new Mailer('memory');
      builder.set('mailer', mailer);

      expect(builder.getDefinition('mailer').isSynthetic()).toBe(true);
      expect(builder.compile().get('mailer')).toBe(mailer);
    });

    it('should make the instance injectable', () => {
      const mailer = new Mailer('memory');
      builder.set('mailer', mailer);
      builder.register('newsletter', Newsletter).setArguments([new Reference('mailer')]);

      expect(builder.compile().get('newsletter', Newsletter).mailer).toBe(mailer);
    });

    it('should refuse to set a service that is not synthetic', () => {
      builder.register('mailer', Mailer);

      expect(() => builder.set('mailer', new Mailer())).toThrowErrorType(ContainerError);
    });
  });

  describe('compile', () => {
    it('should return the container and expose it under service_container', () => {
      const container = builder.compile();

      expect(container).toBeInstanceOf(Container);
      expect(builder.getContainer()).toBe(container);
      expect(container.get(SERVICE_CONTAINER_ID)).toBe(container);
      expect(container.get(SERVICE_CONTAINER_ID, Container)).toBe(container);
    });

    it('should throw FrozenContainerError when compiled twice', () => {
      builder.compile();

      expect(() => builder.compile()).toThrowErrorType(FrozenContainerError);
    });

    it('should freeze the builder and its definitions', () => {
      builder.register('mailer', Mailer);
      builder.compile();

      expect(builder.isCompiled()).toBe(true);
      expect(() => builder.register('other', Mailer)).toThrowErrorType(FrozenContainerError);
      expect(() => builder.setParameter('a', 1)).toThrowErrorType(FrozenContainerError);
      expect(() => builder.setAlias('a', 'mailer')).toThrowErrorType(FrozenContainerError);
      expect(() => builder.getDefinition('mailer').setShared(false)).toThrowErrorType(FrozenContainerError);
    });

    it('should throw from getContainer before compilation', () => {
      expect(() => builder.getContainer()).toThrow('The container has not been compiled yet.');
    });

    it('should leave the builder untouched when a pass fails', () => {
      class FailingPass implements ICompilerPass {
        process(staging: IContainerBuilder): void {
          staging.register('added', Mailer);
          staging.getDefinition('mailer').addMethodCall('addHeader', ['X-Staged']);
          throw new Error('pass failed');
        }
      }
      builder.register('mailer', Mailer);
      builder.addCompilerPass(new FailingPass());

      expect(() => builder.compile()).toThrow('pass failed');
      expect(builder.isCompiled()).toBe(false);
      expect(builder.hasDefinition('added')).toBe(false);
      expect(builder.getDefinition('mailer').getMethodCalls()).toEqual([]);
      expect(builder.getDefinition('mailer').isLocked()).toBe(false);
    });

    it('should allow fixing the configuration after a failed compilation', () => {
      builder.register('newsletter', Newsletter).setArguments([new Reference('mailer')]);

      expect(() => builder.compile()).toThrowErrorType(MissingReferenceTargetError);

      builder.register('mailer', Mailer);

      expect(builder.compile().get('newsletter', Newsletter).mailer).toBeInstanceOf(Mailer);
    });

    it('should keep the changes of successful passes', () => {
      class HeaderPass implements ICompilerPass {
        process(staging: IContainerBuilder): void {
          staging.getDefinition('mailer').addMethodCall('addHeader', ['X-Compiled']);
        }
      }
      builder.register('mailer', Mailer);
      builder.addCompilerPass(new HeaderPass());

      expect(builder.compile().get('mailer', Mailer).headers).toEqual(['X-Compiled']);
    });

    it('should log each pass in debug mode', () => {
      const logger = createLogger();
      createContainerBuilder({ logger, debug: true }).compile();

      expect(logger.debug).toHaveBeenCalledWith('Running compiler pass ResolveParentsPass');
      expect(logger.debug).toHaveBeenCalledWith('Running compiler pass AutowirePass');
      expect(logger.debug).toHaveBeenCalledWith('Running compiler pass ResolveReferencesPass');
    });

    it('should not log when debug is off', () => {
      const logger = createLogger();
      new ContainerBuilder({ logger, debug: false }).compile();

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });
});
