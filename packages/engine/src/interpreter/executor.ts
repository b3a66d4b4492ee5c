/**
 * Template executor
 *
 * Tree-walking interpreter over the template AST. Nodes run strictly in
 * source order; the walk is async only so resolvers may return promises and
 * cancellation can interrupt them.
 */

import {
  ExpressionError,
  ExpressionTimeoutError,
  isPlainObject,
  isTruthy,
  sortedEntries,
  stringify,
  evaluateAst,
  type FunctionRegistry,
} from '@prompty/expressions';
import type { EngineConfig } from '../config';
import { isErrorStrategy, type ErrorStrategy, type ExecutionContext } from '../context';
import {
  CancellationError,
  CircularIncludeError,
  EngineError,
  ExpressionEvaluationError,
  ResolverError,
  ResourceLimitError,
} from '../errors';
import type { Position } from '../lexer/token';
import type {
  ConditionalNode,
  LoopNode,
  Program,
  Statement,
  SwitchNode,
  TagLikeNode,
  TagNode,
} from '../parser/ast-nodes';
import type { Attributes } from '../parser/attributes';
import { TAG } from '../parser/parser';
import type { ResolverRegistry } from '../registry/resolver-registry';
import type { TemplateRegistry } from '../registry/template-registry';
import { CONTENT_ATTRIBUTE, type Resolver, type ResolverRuntime } from '../resolvers/types';
import { findSimilar } from '../suggestions';
import type { ExpressionCache } from './expression-cache';

/**
 * Engine state an execution reads
 */
export interface ExecutionServices {
  readonly config: Readonly<EngineConfig>;
  readonly resolvers: ResolverRegistry;
  readonly templates: TemplateRegistry;
  readonly functions: FunctionRegistry;
  readonly expressions: ExpressionCache;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface ExecutorOptions extends ExecuteOptions {
  /** Names of the templates being rendered, outermost first */
  chain?: readonly string[];
}

/**
 * Result of rendering one tag-like node before the error strategy runs
 */
type Outcome = { ok: true; text: string } | { ok: false; error: Error };

/**
 * Executes one template run
 *
 * Holds per-run state (deadline, include chain); create one per call.
 */
export class Executor {
  private readonly services: ExecutionServices;
  private readonly signal: AbortSignal | undefined;
  private readonly deadline: number;
  private readonly chain: string[];
  private depth: number = 0;

  constructor(services: ExecutionServices, options: ExecutorOptions = {}) {
    this.services = services;
    this.signal = options.signal;
    this.deadline = services.config.clock() + services.config.executionTimeout;
    this.chain = [...(options.chain ?? [])];
  }

  /**
   * Render a program against a context
   */
  async execute(program: Program, context: ExecutionContext): Promise<string> {
    this.checkpoint(program.loc.start);
    return this.renderBody(program.body, context);
  }

  private get config(): Readonly<EngineConfig> {
    return this.services.config;
  }

  // Body rendering

  private async renderBody(statements: readonly Statement[], context: ExecutionContext): Promise<string> {
    let output = '';
    let bytes = 0;

    for (const statement of statements) {
      this.checkpoint(statement.loc.start);
      const text = await this.renderStatement(statement, context);
      if (text === '') {
        continue;
      }

      bytes += Buffer.byteLength(text, 'utf8');
      if (bytes > this.config.maxOutputSize) {
        throw new ResourceLimitError(
          'maxOutputSize',
          `Output exceeds maximum size of ${this.config.maxOutputSize} bytes`,
          statement.loc.start,
        );
      }
      output += text;
    }

    return output;
  }

  private async renderStatement(statement: Statement, context: ExecutionContext): Promise<string> {
    switch (statement.type) {
      case 'Text':
      case 'Raw':
        return statement.value;
      case 'Tag':
        return this.guard(statement, context, (scoped) => this.renderTag(statement, context, scoped));
      case 'Conditional':
        return this.guard(statement, context, () => this.renderConditional(statement, context));
      case 'Loop':
        return this.guard(statement, context, () => this.renderLoop(statement, context));
      case 'Switch':
        return this.guard(statement, context, () => this.renderSwitch(statement, context));
    }
  }

  // Error strategies

  /**
   * Run a tag-like node and apply its error strategy to a failure.
   * `onerror` on the node wins over the context's strategy.
   */
  private async guard(
    node: TagLikeNode,
    context: ExecutionContext,
    render: (scoped: ExecutionContext) => Promise<string>,
  ): Promise<string> {
    const strategy = this.strategyFor(node.attributes, context);
    const outcome = await this.attempt(() => render(context.withErrorStrategy(strategy)));
    if (outcome.ok) {
      return outcome.text;
    }
    return this.recover(node, strategy, outcome.error);
  }

  private strategyFor(attributes: Attributes, context: ExecutionContext): ErrorStrategy {
    const onerror = attributes.get('onerror');
    if (onerror === undefined) {
      return context.errorStrategy;
    }
    return isErrorStrategy(onerror) ? onerror : 'throw';
  }

  /**
   * Resource limits and cancellation are rethrown instead of captured
   */
  private async attempt(render: () => Promise<string>): Promise<Outcome> {
    try {
      return { ok: true, text: await render() };
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private recover(node: TagLikeNode, strategy: ErrorStrategy, error: Error): string {
    switch (strategy) {
      case 'throw':
        throw error;
      case 'default':
        return node.attributes.get('default') ?? '';
      case 'remove':
        return '';
      case 'keepraw':
        return node.raw;
      case 'log':
        this.config.logger.warn('tag_error', {
          tag: tagNameOf(node),
          line: node.loc.start.line,
          column: node.loc.start.column + 1,
          error_type: error.name,
          error: error.message,
        });
        return '';
    }
  }

  // Tags

  private async renderTag(node: TagNode, context: ExecutionContext, scoped: ExecutionContext): Promise<string> {
    const position = node.loc.start;
    const resolver = this.services.resolvers.get(node.name);
    if (!resolver) {
      throw new ResolverError(node.name, unknownTagMessage(node.name, this.services.resolvers.list()), position);
    }

    let attributes = node.attributes;
    if (node.children !== null) {
      attributes = attributes.with(CONTENT_ATTRIBUTE, await this.renderBody(node.children, context));
    }

    this.checkpoint(position);

    try {
      resolver.validate(attributes);
    } catch (error) {
      throw wrapResolverError(node.name, error, position);
    }

    return this.callResolver(resolver, node, attributes, scoped);
  }

  private async callResolver(
    resolver: Resolver,
    node: TagNode,
    attributes: Attributes,
    context: ExecutionContext,
  ): Promise<string> {
    const position = node.loc.start;
    const runtime: ResolverRuntime = {
      signal: this.signal,
      logger: this.config.logger,
      env: this.config.env,
      tag: {
        name: node.name,
        line: position.line,
        column: position.column + 1,
        selfClosing: node.selfClosing,
      },
      hasTemplate: (name) => this.services.templates.has(name),
      includeTemplate: (name, includeContext) => this.includeTemplate(name, includeContext, position),
    };

    // Built-ins only do engine work, which the execution deadline bounds
    const timed = !this.services.resolvers.isBuiltin(resolver.tagName);
    const started = this.config.clock();

    let text: string;
    try {
      const result = resolver.resolve(context, attributes, runtime);
      text = typeof result === 'string' ? result : await this.settle(result, node.name, position, timed);
    } catch (error) {
      throw wrapResolverError(node.name, error, position);
    }

    if (timed && this.config.clock() - started > this.config.resolverTimeout) {
      throw resolverTimeoutError(node.name, this.config.resolverTimeout, position);
    }
    return text;
  }

  /**
   * Await a resolver's promise, giving up on cancellation, the resolver
   * timeout or the execution deadline, whichever comes first
   */
  private settle(promise: Promise<string>, tagName: string, position: Position, timed: boolean): Promise<string> {
    const { resolverTimeout, clock } = this.config;
    const remaining = Math.max(0, this.deadline - clock());
    const byResolver = timed && resolverTimeout <= remaining;
    const signal = this.signal;

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(
        () => {
          cleanup();
          reject(
            byResolver
              ? resolverTimeoutError(tagName, resolverTimeout, position)
              : executionTimeoutError(this.config.executionTimeout, position),
          );
        },
        byResolver ? resolverTimeout : remaining,
      );

      function onAbort(): void {
        cleanup();
        reject(new CancellationError(signal?.reason, position));
      }

      function cleanup(): void {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }

      signal?.addEventListener('abort', onAbort, { once: true });

      promise.then(
        (text) => {
          cleanup();
          resolve(text);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
    });
  }

  /**
   * Render a registered template for `prompty.include`
   */
  private async includeTemplate(name: string, context: ExecutionContext, position: Position): Promise<string> {
    const { maxDepth } = this.config;
    if (this.depth + 1 > maxDepth) {
      throw new ResourceLimitError(
        'maxDepth',
        `Maximum include depth of ${maxDepth} exceeded including '${name}'`,
        position,
      );
    }
    if (this.chain.includes(name)) {
      throw new CircularIncludeError([...this.chain, name], position);
    }

    const template = this.services.templates.get(name);
    if (!template) {
      throw new ResolverError(TAG_INCLUDE, `template '${name}' not found`, position);
    }

    this.depth++;
    this.chain.push(name);
    try {
      return await this.renderBody(template.body.body, context);
    } finally {
      this.chain.pop();
      this.depth--;
    }
  }

  // Control flow

  private async renderConditional(node: ConditionalNode, context: ExecutionContext): Promise<string> {
    for (const branch of node.branches) {
      if (branch.condition === null || isTruthy(this.evaluate(branch.condition, context, branch.loc.start))) {
        return this.renderBody(branch.body, context);
      }
    }
    return '';
  }

  private async renderLoop(node: LoopNode, context: ExecutionContext): Promise<string> {
    const position = node.loc.start;
    const found = context.lookup(node.collection);
    if (!found.found) {
      throw new ResolverError(TAG.FOR, `collection '${node.collection}' not found`, position);
    }

    const items = iterationItems(found.value);
    if (items === null) {
      throw new ResolverError(TAG.FOR, `'${node.collection}' is not a list or map`, position);
    }

    let output = '';
    let bytes = 0;
    let index = 0;

    for (const item of items) {
      if (node.limit !== null && index >= node.limit) {
        break;
      }
      if (index >= this.config.maxLoopIterations) {
        throw new ResourceLimitError(
          'maxLoopIterations',
          `Loop over '${node.collection}' exceeds maximum of ${this.config.maxLoopIterations} iterations`,
          position,
        );
      }
      this.checkpoint(position);

      const scope = context.child({ [node.item]: item });
      if (node.index !== null) {
        scope.set(node.index, index);
      }

      const text = await this.renderBody(node.body, scope);
      bytes += Buffer.byteLength(text, 'utf8');
      if (bytes > this.config.maxOutputSize) {
        throw new ResourceLimitError(
          'maxOutputSize',
          `Output exceeds maximum size of ${this.config.maxOutputSize} bytes`,
          position,
        );
      }
      output += text;
      index++;
    }

    return output;
  }

  private async renderSwitch(node: SwitchNode, context: ExecutionContext): Promise<string> {
    const value = this.evaluate(node.expression, context, node.loc.start);
    const text = stringify(value);

    for (const switchCase of node.cases) {
      const { match } = switchCase;
      const matched =
        match.kind === 'value'
          ? match.value === text
          : isTruthy(this.evaluate(match.expression, context, switchCase.loc.start));
      if (matched) {
        return this.renderBody(switchCase.body, context);
      }
    }

    if (node.defaultCase !== null) {
      return this.renderBody(node.defaultCase, context);
    }
    return '';
  }

  // Helpers

  private evaluate(expression: string, context: ExecutionContext, position: Position): unknown {
    try {
      const ast = this.services.expressions.get(expression);
      return evaluateAst(ast, context.toScope(), {
        expression,
        functions: this.services.functions,
        functionTimeout: this.config.functionTimeout,
        clock: this.config.clock,
      });
    } catch (error) {
      if (error instanceof ExpressionTimeoutError) {
        throw new ResourceLimitError('functionTimeout', error.message, position);
      }
      if (error instanceof ExpressionError) {
        throw new ExpressionEvaluationError(expression, error, position);
      }
      throw error;
    }
  }

  /**
   * Cancellation and deadline check, run before nodes, resolver calls and
   * loop iterations
   */
  private checkpoint(position: Position): void {
    if (this.signal?.aborted) {
      throw new CancellationError(this.signal.reason, position);
    }
    if (this.config.clock() > this.deadline) {
      throw executionTimeoutError(this.config.executionTimeout, position);
    }
  }
}

const TAG_INCLUDE = 'prompty.include';

function isFatal(error: unknown): boolean {
  return error instanceof ResourceLimitError || error instanceof CancellationError;
}

function wrapResolverError(tagName: string, error: unknown, position: Position): Error {
  if (error instanceof EngineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ResolverError(tagName, message, position, error);
}

function resolverTimeoutError(tagName: string, timeout: number, position: Position): ResourceLimitError {
  return new ResourceLimitError('resolverTimeout', `Resolver '${tagName}' exceeded ${timeout}ms`, position);
}

function executionTimeoutError(timeout: number, position: Position): ResourceLimitError {
  return new ResourceLimitError('executionTimeout', `Execution exceeded ${timeout}ms`, position);
}

function unknownTagMessage(name: string, known: readonly string[]): string {
  const suggestions = findSimilar(name, known);
  const hint = suggestions.length > 0 ? ` (did you mean: ${suggestions.join(', ')}?)` : '';
  return `unknown tag '${name}'${hint}`;
}

function tagNameOf(node: TagLikeNode): string {
  switch (node.type) {
    case 'Tag':
      return node.name;
    case 'Conditional':
      return TAG.IF;
    case 'Loop':
      return TAG.FOR;
    case 'Switch':
      return TAG.SWITCH;
  }
}

/**
 * Arrays iterate in order; maps and objects by sorted key as `{key, value}`.
 * Null iterates nothing; anything else is not iterable.
 */
function iterationItems(value: unknown): readonly unknown[] | null {
  if (value === null || value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value;
  }
  if (value instanceof Map || isPlainObject(value)) {
    return sortedEntries(value).map(([key, item]) => ({ key, value: item }));
  }
  return null;
}
