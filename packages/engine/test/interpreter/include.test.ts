import { beforeEach, describe, expect, it } from 'vitest';
import { CircularIncludeError, ResourceLimitError, type Engine } from '../../src/index';
import { createTestEngine } from '../helpers';

describe('prompty.include', () => {
  let engine: Engine;

  beforeEach(() => {
    ({ engine } = createTestEngine());
    engine.registerTemplate('greet', 'Hello, {~prompty.var name="name" /~}!');
  });

  it('renders a registered template against the caller data', async () => {
    expect(await engine.execute('{~prompty.include template="greet" /~}', { name: 'Ada' })).toBe('Hello, Ada!');
  });

  it('binds extra attributes as data', async () => {
    expect(await engine.execute('{~prompty.include template="greet" name="Bob" /~}', { name: 'Ada' })).toBe(
      'Hello, Bob!',
    );
  });

  it('uses the with path as root data', async () => {
    engine.registerTemplate('card', '{~prompty.var name="name" /~} <{~prompty.var name="email" /~}>');
    const output = await engine.execute('{~prompty.include template="card" with="user" /~}', {
      user: { name: 'Ada', email: 'ada@example.com' },
    });
    expect(output).toBe('Ada <ada@example.com>');
  });

  it('hides caller data when with is given', async () => {
    engine.registerTemplate('titled', '{~prompty.var name="title" default="none" /~}');
    const output = await engine.execute('{~prompty.include template="titled" with="user" /~}', {
      user: { name: 'Ada' },
      title: 'Dr',
    });
    expect(output).toBe('none');
  });

  it('binds non-object with values under _value', async () => {
    engine.registerTemplate('tags', '{~prompty.for item="t" in="_value"~}#{~prompty.var name="t" /~}{~/prompty.for~}');
    expect(await engine.execute('{~prompty.include template="tags" with="tags" /~}', { tags: ['a', 'b'] })).toBe(
      '#a#b',
    );
  });

  it('hides caller data when isolated', async () => {
    engine.registerTemplate('secret', '[{~prompty.var name="token" default="hidden" /~}]');
    const data = { token: 'test-secret' };

    expect(await engine.execute('{~prompty.include template="secret" isolate="true" /~}', data)).toBe('[hidden]');
    expect(await engine.execute('{~prompty.include template="secret" /~}', data)).toBe('[test-secret]');
  });

  it('sees loop variables of the caller', async () => {
    engine.registerTemplate('row', '-{~prompty.var name="u.name" /~}');
    const output = await engine.execute(
      '{~prompty.for item="u" in="users"~}{~prompty.include template="row" /~}{~/prompty.for~}',
      { users: [{ name: 'a' }, { name: 'b' }] },
    );
    expect(output).toBe('-a-b');
  });

  it('fails for unregistered templates', async () => {
    await expect(engine.execute('{~prompty.include template="nope" /~}')).rejects.toThrow(
      "Error at line 1, column 1: template 'nope' not found",
    );
  });

  it('validates isolate', async () => {
    await expect(engine.execute('{~prompty.include template="greet" isolate="yes" /~}')).rejects.toThrow(
      `'isolate' must be "true" or "false", got 'yes'`,
    );
  });

  describe('recursion', () => {
    it('detects circular includes', async () => {
      engine.registerTemplate('a', 'A{~prompty.include template="b" /~}');
      engine.registerTemplate('b', 'B{~prompty.include template="a" /~}');

      const error = await engine.executeTemplate('a').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(CircularIncludeError);
      if (error instanceof CircularIncludeError) {
        expect(error.chain).toEqual(['a', 'b', 'a']);
        expect(error.detail).toBe('Circular include: a -> b -> a');
      }
    });

    it('detects a template including itself', async () => {
      engine.registerTemplate('self', 'x{~prompty.include template="self" /~}');
      await expect(engine.executeTemplate('self')).rejects.toThrow('Circular include: self -> self');
    });

    it('lets an error strategy absorb a cycle', async () => {
      engine.registerTemplate('a', 'A{~prompty.include template="b" onerror="remove" /~}');
      engine.registerTemplate('b', 'B{~prompty.include template="a" /~}');

      expect(await engine.executeTemplate('a')).toBe('AB');
    });

    it('allows the same template twice in sequence', async () => {
      expect(
        await engine.execute(
          '{~prompty.include template="greet" name="a" /~} {~prompty.include template="greet" name="b" /~}',
        ),
      ).toBe('Hello, a! Hello, b!');
    });
  });

  describe('maxDepth', () => {
    const registerChain = (target: Engine, length: number) => {
      for (let i = 0; i < length; i++) {
        target.registerTemplate(`t${i}`, `${i}|{~prompty.include template="t${i + 1}" /~}`);
      }
      target.registerTemplate(`t${length}`, 'end');
    };

    it('allows includes up to the maximum depth', async () => {
      const { engine: deep } = createTestEngine({ maxDepth: 10 });
      registerChain(deep, 10);

      expect(await deep.executeTemplate('t0')).toBe('0|1|2|3|4|5|6|7|8|9|end');
    });

    it('fails one level past it, whatever the error strategy', async () => {
      const { engine: deep } = createTestEngine({ maxDepth: 9, errorStrategy: 'remove' });
      registerChain(deep, 10);

      const error = await deep.executeTemplate('t0').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ResourceLimitError);
      if (error instanceof ResourceLimitError) {
        expect(error.limit).toBe('maxDepth');
        expect(error.detail).toBe("Maximum include depth of 9 exceeded including 't10'");
      }
    });
  });
});
