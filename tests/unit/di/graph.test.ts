/**
 * @fileoverview Unit tests for alias resolution and tag lookup
 */

import {
  CircularDependencyError,
  ContainerError,
  Definition,
  findTaggedServiceIds,
  resolveAlias,
} from '../../../src';

describe('resolveAlias', () => {
  it('should follow a chain to the final id', () => {
    const aliases = new Map([
      ['mailer', 'mailer.smtp'],
      ['mailer.smtp', 'mailer.smtp.v2'],
    ]);

    expect(resolveAlias('mailer', aliases)).toBe('mailer.smtp.v2');
    expect(resolveAlias('logger', aliases)).toBe('logger');
  });

  it('should report an alias cycle with its path', () => {
    const aliases = new Map([
      ['a', 'b'],
      ['b', 'a'],
    ]);

    expect(() => resolveAlias('a', aliases)).toThrowErrorType(CircularDependencyError);
    expect(() => resolveAlias('a', aliases)).toThrow('Circular alias reference detected: a -> b -> a');
  });

  it('should stop after maxDepth hops', () => {
    const aliases = new Map([
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'd'],
    ]);

    expect(resolveAlias('b', aliases, 2)).toBe('d');
    expect(() => resolveAlias('a', aliases, 2)).toThrowErrorType(ContainerError);
    expect(() => resolveAlias('a', aliases, 2)).toThrow('Alias chain starting at "a" is longer than 2.');
  });
});

describe('findTaggedServiceIds', () => {
  it('should return tagged ids with every occurrence, in registration order', () => {
    const definitions = new Map([
      ['csv', new Definition().addTag('report.generator', { format: 'csv' })],
      ['plain', new Definition()],
      [
        'pdf',
        new Definition()
          .addTag('report.generator', { format: 'pdf' })
          .addTag('report.generator', { format: 'pdf/a' }),
      ],
    ]);

    const tagged = findTaggedServiceIds(definitions, 'report.generator');

    expect([...tagged.keys()]).toEqual(['csv', 'pdf']);
    expect(tagged.get('pdf')).toEqual([{ format: 'pdf' }, { format: 'pdf/a' }]);
    expect(findTaggedServiceIds(definitions, 'report').size).toBe(0);
  });
});
