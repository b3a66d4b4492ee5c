import { describe, expect, it } from 'vitest';
import { Parser, ParserError } from '../src/parser';
import type { Expression } from '../src/parser';

/**
 * Strip loc fields so assertions focus on structure
 */
function strip(node: Expression): unknown {
  return JSON.parse(JSON.stringify(node, (key, value: unknown) => (key === 'loc' ? undefined : value)));
}

describe('Parser', () => {
  const parser = new Parser();
  const parse = (input: string) => strip(parser.parse(input));

  describe('literals', () => {
    it('parses strings, numbers, booleans and null', () => {
      expect(parse("'hi'")).toEqual({ type: 'Literal', value: 'hi' });
      expect(parse('3.5')).toEqual({ type: 'Literal', value: 3.5 });
      expect(parse('true')).toEqual({ type: 'Literal', value: true });
      expect(parse('nil')).toEqual({ type: 'Literal', value: null });
    });

    it('parses negative number literals', () => {
      expect(parse('-2')).toEqual({ type: 'Literal', value: -2 });
    });

    it('rejects unary minus on anything but a number', () => {
      expect(() => parser.parse('-x')).toThrow(/Unary minus is only allowed before a number/);
    });
  });

  describe('paths', () => {
    it('parses a single identifier', () => {
      expect(parse('name')).toEqual({ type: 'Path', parts: ['name'], original: 'name' });
    });

    it('parses dotted paths', () => {
      expect(parse('user.profile.name')).toEqual({
        type: 'Path',
        parts: ['user', 'profile', 'name'],
        original: 'user.profile.name',
      });
    });

    it('requires a name after a dot', () => {
      expect(() => parser.parse('user.')).toThrow(/Expected property name after "."/);
    });
  });

  describe('operators', () => {
    it('parses comparisons', () => {
      expect(parse('a >= 1')).toEqual({
        type: 'BinaryExpression',
        operator: '>=',
        left: { type: 'Path', parts: ['a'], original: 'a' },
        right: { type: 'Literal', value: 1 },
      });
    });

    it('binds && tighter than ||', () => {
      expect(parse('a || b && c')).toEqual({
        type: 'LogicalExpression',
        operator: '||',
        left: { type: 'Path', parts: ['a'], original: 'a' },
        right: {
          type: 'LogicalExpression',
          operator: '&&',
          left: { type: 'Path', parts: ['b'], original: 'b' },
          right: { type: 'Path', parts: ['c'], original: 'c' },
        },
      });
    });

    it('binds comparison tighter than equality', () => {
      const ast = parser.parse('a < b == true');
      expect(ast.type).toBe('BinaryExpression');
      if (ast.type === 'BinaryExpression') {
        expect(ast.operator).toBe('==');
        expect(ast.left.type).toBe('BinaryExpression');
      }
    });

    it('parses negation and grouping', () => {
      expect(parse('!(a && b)')).toEqual({
        type: 'UnaryExpression',
        operator: '!',
        argument: {
          type: 'LogicalExpression',
          operator: '&&',
          left: { type: 'Path', parts: ['a'], original: 'a' },
          right: { type: 'Path', parts: ['b'], original: 'b' },
        },
      });
    });
  });

  describe('calls', () => {
    it('parses calls with arguments', () => {
      expect(parse("contains(tags, 'x')")).toEqual({
        type: 'CallExpression',
        callee: 'contains',
        arguments: [
          { type: 'Path', parts: ['tags'], original: 'tags' },
          { type: 'Literal', value: 'x' },
        ],
      });
    });

    it('parses calls without arguments', () => {
      expect(parse('now()')).toEqual({ type: 'CallExpression', callee: 'now', arguments: [] });
    });

    it('rejects method calls', () => {
      expect(() => parser.parse('user.name()')).toThrow(/Method calls are not allowed/);
    });

    it('rejects access on call results', () => {
      expect(() => parser.parse('first(items).name')).toThrow(/Call results cannot be accessed/);
    });

    it('requires a closing parenthesis', () => {
      expect(() => parser.parse('len(items')).toThrow(/Expected "\)" after arguments/);
    });
  });

  describe('errors', () => {
    it('rejects empty input', () => {
      expect(() => parser.parse('   ')).toThrow(/Empty expression/);
    });

    it('rejects trailing tokens', () => {
      expect(() => parser.parse('a b')).toThrow("Unexpected token 'b'");
    });

    it('rejects dangling operators', () => {
      expect(() => parser.parse('a ==')).toThrow(/Unexpected end of expression/);
    });

    it('reports the position of the offending token', () => {
      try {
        parser.parse('a == == b');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ParserError);
        if (error instanceof ParserError) {
          expect(error.position).toEqual({ line: 1, column: 5, offset: 5 });
        }
      }
    });
  });

  describe('locations', () => {
    it('spans the full expression', () => {
      const ast = parser.parse('a && b');
      expect(ast.loc?.start.offset).toBe(0);
      expect(ast.loc?.end.offset).toBe(6);
    });
  });
});
