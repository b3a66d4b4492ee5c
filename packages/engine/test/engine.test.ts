import { describe, expect, it } from 'vitest';
import {
  ExecutionContext,
  LexerError,
  ParserError,
  RegistrationError,
  ResolverError,
  Template,
} from '../src/index';
import { createFakeClock, createTestEngine, resolverOf } from './helpers';

describe('Engine', () => {
  describe('scenarios', () => {
    it('renders a variable', async () => {
      const { engine } = createTestEngine();
      const output = await engine.execute('Hello, {~prompty.var name="user" /~}!', { user: 'Alice' });
      expect(output).toBe('Hello, Alice!');
    });

    it('falls through to else', async () => {
      const { engine } = createTestEngine();
      const output = await engine.execute(
        '{~prompty.if eval="n>0"~}pos{~prompty.else~}non-pos{~/prompty.if~}',
        { n: -1 },
      );
      expect(output).toBe('non-pos');
    });

    it('stops a loop at its limit', async () => {
      const { engine } = createTestEngine();
      const output = await engine.execute(
        '{~prompty.for item="x" in="items" limit="2"~}{~prompty.var name="x"/~}{~/prompty.for~}',
        { items: [1, 2, 3] },
      );
      expect(output).toBe('12');
    });

    it('keeps the first resolver registered under a name', async () => {
      const { engine } = createTestEngine();
      const first = resolverOf('echo', () => 'first');
      const second = resolverOf('echo', () => 'second');

      engine.register(first);
      const error = engine.tryRegister(second);

      expect(error).toBeInstanceOf(RegistrationError);
      expect(error?.kind).toBe('resolver');
      expect(error?.registrationName).toBe('echo');
      expect(engine.hasResolver('echo')).toBe(true);
      expect(await engine.execute('{~echo /~}')).toBe('first');
    });

    it('substitutes the default attribute under onerror="default"', async () => {
      const { engine } = createTestEngine();
      const output = await engine.execute('{~prompty.var name="missing" onerror="default" default="N/A" /~}');
      expect(output).toBe('N/A');
    });
  });

  describe('execute', () => {
    it('rejects instead of throwing on malformed source', async () => {
      const { engine } = createTestEngine();
      let result: Promise<string> | undefined;

      expect(() => {
        result = engine.execute('{~prompty.var name="x"');
      }).not.toThrow();
      await expect(result).rejects.toBeInstanceOf(LexerError);
      await expect(engine.execute('{~prompty.var name="x"')).rejects.toThrow('Unterminated tag');
    });

    it('rejects on structural errors', async () => {
      const { engine } = createTestEngine();
      await expect(engine.execute('{~prompty.if eval="a"~}x')).rejects.toBeInstanceOf(ParserError);
    });
  });

  describe('parse', () => {
    it('returns a reusable template', async () => {
      const { engine } = createTestEngine();
      const template = engine.parse('Hi {~prompty.var name="n" /~}', 'hi');

      expect(template).toBeInstanceOf(Template);
      expect(template.name).toBe('hi');
      expect(template.source).toBe('Hi {~prompty.var name="n" /~}');
      expect(await template.execute({ n: 'a' })).toBe('Hi a');
      expect(await template.execute({ n: 'b' })).toBe('Hi b');
    });

    it('is deterministic for the same input', async () => {
      const { engine } = createTestEngine();
      const template = engine.parse(
        '{~prompty.for item="e" in="m"~}{~prompty.var name="e.key" /~}{~/prompty.for~}',
      );
      const data = { m: { e: 1, d: 2, c: 3, b: 4, a: 5 } };

      const first = await template.execute(data);
      const second = await template.execute(data);
      expect(first).toBe('abcde');
      expect(second).toBe(first);
    });

    it('resolves tags registered after parsing', async () => {
      const { engine } = createTestEngine();
      const template = engine.parse('[{~late /~}]');

      engine.register(resolverOf('late', () => 'now'));
      expect(await template.execute()).toBe('[now]');
    });

    it('logs parsing at debug level', () => {
      const { engine, logger } = createTestEngine();
      engine.parse('a{~x /~}', 'named');
      expect(logger.debug).toHaveBeenCalledWith('template_parsed', { template: 'named', statements: 2 });
    });
  });

  describe('executeWithContext', () => {
    it('uses the supplied context and its strategy', async () => {
      const { engine } = createTestEngine();
      const template = engine.parse('[{~prompty.var name="a" /~}|{~prompty.var name="b" /~}]');
      const context = new ExecutionContext({ a: 1 }, 'remove');

      expect(await template.executeWithContext(context)).toBe('[1|]');
    });

    it('logs completion', async () => {
      const { engine, logger } = createTestEngine();
      await engine.execute('abc');
      expect(logger.debug).toHaveBeenCalledWith(
        'execution_completed',
        expect.objectContaining({ template: null, output_bytes: 3 }),
      );
    });
  });

  describe('resolvers', () => {
    it('lists built-ins and registered resolvers', () => {
      const { engine, logger } = createTestEngine();
      engine.register(resolverOf('b-tag', () => ''));
      engine.register(resolverOf('a-tag', () => ''));

      expect(engine.listResolvers()).toEqual(['a-tag', 'b-tag', 'prompty.env', 'prompty.include', 'prompty.var']);
      expect(engine.resolverCount()).toBe(5);
      expect(logger.debug).toHaveBeenCalledWith('resolver_registered', { tag: 'a-tag' });
    });

    it('rejects the reserved prefix', () => {
      const { engine } = createTestEngine();
      expect(() => engine.register(resolverOf('prompty.mine', () => ''))).toThrow(
        "Cannot register resolver 'prompty.mine': the 'prompty.' prefix is reserved",
      );
    });

    it('unregisters custom resolvers but not built-ins', () => {
      const { engine } = createTestEngine();
      engine.register(resolverOf('echo', () => ''));

      expect(engine.unregister('echo')).toBe(true);
      expect(engine.unregister('echo')).toBe(false);
      expect(() => engine.unregister('prompty.var')).toThrow(RegistrationError);
      expect(engine.hasResolver('prompty.var')).toBe(true);
    });

    it('hands block content to the resolver', async () => {
      const { engine } = createTestEngine();
      engine.register(
        resolverOf('shout', (_ctx, attributes) => (attributes.get('prompty.content') ?? '').toUpperCase(), true),
      );

      const output = await engine.execute('{~shout~}hi {~prompty.var name="n" /~}{~/shout~}!', { n: 'bob' });
      expect(output).toBe('HI BOB!');
    });

    it('awaits async resolvers in order', async () => {
      const { engine } = createTestEngine();
      const calls: string[] = [];
      engine.register(
        resolverOf('later', async (_ctx, attributes) => {
          const id = attributes.get('id') ?? '';
          await new Promise((resolve) => setTimeout(resolve, id === 'a' ? 10 : 0));
          calls.push(id);
          return id;
        }),
      );

      expect(await engine.execute('{~later id="a" /~}{~later id="b" /~}')).toBe('ab');
      expect(calls).toEqual(['a', 'b']);
    });

    it('passes the tag position to the resolver', async () => {
      const { engine } = createTestEngine();
      engine.register(resolverOf('where', (_ctx, _attrs, runtime) => `${runtime.tag.line}:${runtime.tag.column}`));

      expect(await engine.execute('ab\n  {~where /~}')).toBe('ab\n  2:3');
    });

    it('wraps resolver failures with the tag position', async () => {
      const { engine } = createTestEngine();
      engine.register(
        resolverOf('boom', () => {
          throw new Error('kaput');
        }),
      );

      const result = engine.execute('x\n{~boom /~}');
      await expect(result).rejects.toBeInstanceOf(ResolverError);
      await expect(engine.execute('x\n{~boom /~}')).rejects.toThrow('Error at line 2, column 1: kaput');
    });

    it('reports validate failures as resolver errors', async () => {
      const { engine } = createTestEngine();
      await expect(engine.execute('{~prompty.var /~}')).rejects.toThrow(
        "Error at line 1, column 1: missing required 'name' attribute",
      );
    });
  });

  describe('functions', () => {
    it('registers functions for eval expressions', async () => {
      const { engine, logger } = createTestEngine();
      engine.registerFunction({
        name: 'isEven',
        minArgs: 1,
        maxArgs: 1,
        fn: ([n]) => typeof n === 'number' && n % 2 === 0,
      });

      const template = engine.parse('{~prompty.if eval="isEven(n)"~}even{~prompty.else~}odd{~/prompty.if~}');
      expect(await template.execute({ n: 4 })).toBe('even');
      expect(await template.execute({ n: 3 })).toBe('odd');
      expect(engine.hasFunction('isEven')).toBe(true);
      expect(logger.debug).toHaveBeenCalledWith('function_registered', { function: 'isEven' });
    });

    it('reads now() from the engine clock', async () => {
      const clock = createFakeClock(Date.UTC(2024, 2, 5, 9));
      const { engine } = createTestEngine({ clock: clock.now });
      const source =
        '{~prompty.if eval="weekday(now()) == \'Tuesday\' && year(now()) == 2024"~}on time{~/prompty.if~}';

      expect(await engine.execute(source)).toBe('on time');
    });

    it('returns collisions from tryRegisterFunction', () => {
      const { engine } = createTestEngine();
      const error = engine.tryRegisterFunction({ name: 'upper', minArgs: 1, maxArgs: 1, fn: () => '' });

      expect(error).toBeInstanceOf(RegistrationError);
      expect(error?.kind).toBe('function');
      expect(error?.message).toBe("Function 'upper' is already registered");
    });

    it('refuses to unregister built-in functions', () => {
      const { engine } = createTestEngine();
      const count = engine.functionCount();

      expect(() => engine.unregisterFunction('len')).toThrow(RegistrationError);
      expect(engine.functionCount()).toBe(count);
      expect(engine.listFunctions()).toContain('len');
    });

    it('unregisters custom functions', () => {
      const { engine } = createTestEngine();
      engine.registerFunction({ name: 'one', minArgs: 0, maxArgs: 0, fn: () => 1 });

      expect(engine.unregisterFunction('one')).toBe(true);
      expect(engine.hasFunction('one')).toBe(false);
    });
  });

  describe('templates', () => {
    it('registers, lists and removes templates', () => {
      const { engine, logger } = createTestEngine();
      engine.registerTemplate('b', 'B');
      engine.registerTemplate('a', engine.parse('A'));

      expect(engine.listTemplates()).toEqual(['a', 'b']);
      expect(engine.templateCount()).toBe(2);
      expect(engine.hasTemplate('a')).toBe(true);
      expect(engine.getTemplate('a')?.name).toBe('a');
      expect(logger.debug).toHaveBeenCalledWith('template_registered', { template: 'b' });

      expect(engine.unregisterTemplate('a')).toBe(true);
      expect(engine.getTemplate('a')).toBeUndefined();
    });

    it('keeps the first template registered under a name', async () => {
      const { engine } = createTestEngine();
      engine.registerTemplate('t', 'one');
      const error = engine.tryRegisterTemplate('t', 'two');

      expect(error).toBeInstanceOf(RegistrationError);
      expect(error?.message).toBe("Template 't' is already registered");
      expect(await engine.executeTemplate('t')).toBe('one');
    });

    it('rejects empty and reserved names', () => {
      const { engine } = createTestEngine();
      expect(engine.tryRegisterTemplate('', 'x')?.message).toBe('Template name must not be empty');
      expect(engine.tryRegisterTemplate('prompty.base', 'x')?.message).toBe(
        "Cannot register template 'prompty.base': the 'prompty.' prefix is reserved",
      );
    });

    it('rejects executing an unknown template', async () => {
      const { engine } = createTestEngine();
      await expect(engine.executeTemplate('nope')).rejects.toThrow("Template 'nope' is not registered");
    });

    it('executes registered templates with data', async () => {
      const { engine } = createTestEngine();
      engine.registerTemplate('hello', 'Hello, {~prompty.var name="who" /~}');
      expect(await engine.executeTemplate('hello', { who: 'world' })).toBe('Hello, world');
    });
  });

  describe('createContext', () => {
    it('uses the engine default strategy', () => {
      const { engine } = createTestEngine({ errorStrategy: 'keepraw' });
      const context = engine.createContext({ a: 1 });

      expect(context.errorStrategy).toBe('keepraw');
      expect(context.get('a')).toBe(1);
    });
  });
});
