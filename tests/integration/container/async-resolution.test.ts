/**
 * @fileoverview Integration test: asynchronous construction with resolve()
 */

import {
  CircularDependencyError,
  Container,
  ContainerBuilder,
  ILogger,
  Reference,
  ServiceCreationError,
  ServiceNotFoundError,
  silentLogger,
} from '../../../src';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

class Connection {
  constructor(readonly dsn: string) {}
}

class Repository {
  constructor(readonly connection: Connection) {}
}

class Cache {
  warmed = false;

  async warm(): Promise<void> {
    await delay(5);
    this.warmed = true;
  }

  async fail(): Promise<void> {
    await delay(1);
    throw new Error('warm-up failed');
  }
}

class Pool {
  async acquire(name: string): Promise<Connection> {
    await delay(1);
    return new Connection(`pool/${name}`);
  }
}

class Link {
  constructor(readonly next: unknown) {}
}

describe('Container.resolve', () => {
  let builder: ContainerBuilder;
  let opened: number;

  const connect = async (dsn: string): Promise<Connection> => {
    opened++;
    await delay(10);
    return new Connection(dsn);
  };

  beforeEach(() => {
    opened = 0;
    builder = new ContainerBuilder({ logger: silentLogger, debug: false });
    builder.setParameter('db.dsn', 'postgres://localhost/app');
    builder.register('db').setFactory(connect).setArguments(['%db.dsn%']);
  });

  it('should await an async factory', async () => {
    const container = builder.compile();

    const connection = await container.resolve('db', Connection);

    expect(connection.dsn).toBe('postgres://localhost/app');
  });

  it('should build a shared service once for concurrent calls', async () => {
    const container = builder.compile();

    const [first, second, third] = await Promise.all([
      container.resolve('db'),
      container.resolve('db'),
      container.resolve('db'),
    ]);

    expect(opened).toBe(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(container.get('db')).toBe(first);
  });

  it('should build a non-shared service for every call', async () => {
    builder.getDefinition('db').setShared(false);
    const container = builder.compile();

    const [first, second] = await Promise.all([container.resolve('db'), container.resolve('db')]);

    expect(opened).toBe(2);
    expect(second).not.toBe(first);
  });

  it('should resolve async dependencies before the dependent', async () => {
    builder.register('repository', Repository).setArguments([new Reference('db')]);
    const container = builder.compile();

    const repository = await container.resolve('repository', Repository);

    expect(repository.connection).toBe(await container.resolve('db'));
  });

  it('should await async method calls', async () => {
    builder.register('cache', Cache).addMethodCall('warm');
    const container = builder.compile();

    expect((await container.resolve('cache', Cache)).warmed).toBe(true);
  });

  it('should evict the instance when an async method call fails', async () => {
    builder.register('cache', Cache).addMethodCall('fail');
    const container = builder.compile();

    await expect(container.resolve('cache')).rejects.toThrow('warm-up failed');
    expect(container.initialized('cache')).toBe(false);
  });

  it('should make a concurrent call wait for pending method calls', async () => {
    builder.register('cache', Cache).addMethodCall('warm');
    const container = builder.compile();

    const first = container.resolve('cache', Cache);
    await delay(1);
    const second = await container.resolve('cache', Cache);

    expect(second.warmed).toBe(true);
    expect(second).toBe(await first);
  });

  it('should refuse a synchronous get while method calls are pending', async () => {
    builder.register('cache', Cache).addMethodCall('warm');
    const container = builder.compile();

    const pending = container.resolve('cache');
    await delay(1);

    expect(() => container.get('cache')).toThrow(
      'Cannot create service "cache": it is being built by resolve(); await it instead',
    );
    expect(container.initialized('cache')).toBe(false);
    await pending;
    expect(container.initialized('cache')).toBe(true);
  });

  it('should reject every concurrent caller when a method call fails', async () => {
    builder.register('cache', Cache).addMethodCall('fail');
    const container = builder.compile();

    const first = container.resolve('cache');
    await delay(1);
    const second = container.resolve('cache');

    const results = await Promise.allSettled([first, second]);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    expect(container.initialized('cache')).toBe(false);
  });

  it('should call an async method of a factory service', async () => {
    builder.register('pool', Pool);
    builder.register('replica').setFactory([new Reference('pool'), 'acquire']).setArguments(['replica']);
    const container = builder.compile();

    expect((await container.resolve('replica', Connection)).dsn).toBe('pool/replica');
  });

  it('should refuse a synchronous get while resolve() builds the service', async () => {
    const container = builder.compile();

    const pending = container.resolve('db');

    expect(() => container.get('db')).toThrowErrorType(ServiceCreationError);
    expect(() => container.get('db')).toThrow(
      'Cannot create service "db": it is being built by resolve(); await it instead',
    );
    await expect(pending).resolves.toBeInstanceOf(Connection);
  });

  it('should report a cycle instead of waiting for itself', async () => {
    builder.register('A', Link).setArguments([new Reference('B')]);
    builder.register('B', Link).setArguments([new Reference('A')]);
    const container = builder.compile();

    await expect(container.resolve('A')).rejects.toBeInstanceOf(CircularDependencyError);
    await expect(container.resolve('A')).rejects.toThrow('Circular dependency detected: A -> B -> A');
  });

  it('should reject an unknown id', async () => {
    const container = builder.compile();

    await expect(container.resolve('nope')).rejects.toBeInstanceOf(ServiceNotFoundError);
  });

  it('should log construction in debug mode', async () => {
    const logger: jest.Mocked<ILogger> = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const debugBuilder = new ContainerBuilder({ logger, debug: true });
    debugBuilder.register('db').setFactory(connect).setArguments(['sqlite::memory:']);
    const container = debugBuilder.compile();

    await container.resolve('db');

    expect(container).toBeInstanceOf(Container);
    expect(logger.debug).toHaveBeenCalledWith('Resolving service "db"');
  });
});
