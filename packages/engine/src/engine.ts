import {
  createFunctionRegistry,
  FunctionRegistryError,
  type ExpressionFunction,
  type FunctionRegistry,
} from '@prompty/expressions';
import { resolveEngineOptions, type EngineConfig, type EngineOptions } from './config';
import { ExecutionContext } from './context';
import { RegistrationError } from './errors';
import { ExpressionCache } from './interpreter/expression-cache';
import type { ExecuteOptions, ExecutionServices } from './interpreter/executor';
import { Parser } from './parser/parser';
import { ResolverRegistry } from './registry/resolver-registry';
import { TemplateRegistry } from './registry/template-registry';
import { builtinResolvers } from './resolvers/builtins';
import type { Resolver } from './resolvers/types';
import { Template } from './template';
import { Validator, type ValidationResult } from './validation/validator';

type TemplateData = Record<string, unknown> | Map<string, unknown>;

/**
 * Entry point: owns the registries and configuration, parses and runs
 * templates
 *
 * @example
 * ```ts
 * const engine = createEngine({ errorStrategy: 'remove' });
 * engine.registerTemplate('greeting', 'Hello, {~prompty.var name="name" /~}!');
 * await engine.execute('{~prompty.include template="greeting" name="Ada" /~}'); // => 'Hello, Ada!'
 * ```
 */
export class Engine {
  readonly config: Readonly<EngineConfig>;
  private readonly resolvers = new ResolverRegistry();
  private readonly templates = new TemplateRegistry();
  private readonly functions: FunctionRegistry;
  private readonly services: ExecutionServices;
  private readonly validator: Validator;

  constructor(options: EngineOptions = {}) {
    this.config = resolveEngineOptions(options);
    this.functions = createFunctionRegistry({ clock: this.config.clock });

    for (const resolver of builtinResolvers) {
      this.resolvers.registerBuiltin(resolver.tagName, resolver);
    }

    const expressions = new ExpressionCache();
    this.services = {
      config: this.config,
      resolvers: this.resolvers,
      templates: this.templates,
      functions: this.functions,
      expressions,
    };
    this.validator = new Validator({
      delimiters: this.config.delimiters,
      resolvers: this.resolvers,
      templates: this.templates,
      expressions,
    });
  }

  // Parsing and execution

  /**
   * @throws {LexerError | ParserError} On malformed source
   */
  parse(source: string, name?: string): Template {
    const body = Parser.parse(source, this.config.delimiters);
    this.config.logger.debug('template_parsed', {
      template: name ?? null,
      statements: body.body.length,
    });
    return new Template(source, body, this.services, name);
  }

  /**
   * Parse and run a source string once. Parse errors reject the promise.
   */
  async execute(source: string, data: TemplateData = {}, options: ExecuteOptions = {}): Promise<string> {
    return this.parse(source).execute(data, options);
  }

  /**
   * Run a registered template by name
   *
   * @throws {RegistrationError} When no template has that name
   */
  executeTemplate(name: string, data: TemplateData = {}, options: ExecuteOptions = {}): Promise<string> {
    const template = this.templates.get(name);
    if (!template) {
      return Promise.reject(new RegistrationError('template', name, `Template '${name}' is not registered`));
    }
    return template.execute(data, options);
  }

  /**
   * Check a source string without running it
   */
  validate(source: string): ValidationResult {
    return this.validator.validate(source);
  }

  createContext(data: TemplateData = {}): ExecutionContext {
    return new ExecutionContext(data, this.config.errorStrategy);
  }

  // Resolvers

  /**
   * @throws {RegistrationError} On a taken or reserved name
   */
  register(resolver: Resolver): void {
    this.resolvers.register(resolver);
    this.config.logger.debug('resolver_registered', { tag: resolver.tagName });
  }

  tryRegister(resolver: Resolver): RegistrationError | null {
    return attemptRegistration(() => this.register(resolver));
  }

  unregister(tagName: string): boolean {
    return this.resolvers.unregister(tagName);
  }

  hasResolver(tagName: string): boolean {
    return this.resolvers.has(tagName);
  }

  listResolvers(): string[] {
    return this.resolvers.list();
  }

  resolverCount(): number {
    return this.resolvers.count();
  }

  // Functions

  /**
   * @throws {RegistrationError} On a taken or invalid name or arity
   */
  registerFunction(fn: ExpressionFunction): void {
    try {
      this.functions.register(fn);
    } catch (error) {
      if (error instanceof FunctionRegistryError) {
        throw new RegistrationError('function', fn.name, error.message, error);
      }
      throw error;
    }
    this.config.logger.debug('function_registered', { function: fn.name });
  }

  tryRegisterFunction(fn: ExpressionFunction): RegistrationError | null {
    return attemptRegistration(() => this.registerFunction(fn));
  }

  /**
   * @throws {RegistrationError} For built-in functions
   */
  unregisterFunction(name: string): boolean {
    try {
      return this.functions.unregister(name);
    } catch (error) {
      if (error instanceof FunctionRegistryError) {
        throw new RegistrationError('function', name, error.message, error);
      }
      throw error;
    }
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  listFunctions(): string[] {
    return this.functions.list();
  }

  functionCount(): number {
    return this.functions.count();
  }

  // Templates

  /**
   * Register source (parsed here) or an already parsed template
   *
   * @throws {RegistrationError} On a taken, empty or reserved name
   * @throws {LexerError | ParserError} When source does not parse
   */
  registerTemplate(name: string, template: string | Template): void {
    const parsed = typeof template === 'string' || template.name !== name
      ? this.parse(typeof template === 'string' ? template : template.source, name)
      : template;
    this.templates.register(name, parsed);
    this.config.logger.debug('template_registered', { template: name });
  }

  /**
   * Like registerTemplate, returning registration failures instead of
   * throwing them. Parse errors still throw.
   */
  tryRegisterTemplate(name: string, template: string | Template): RegistrationError | null {
    return attemptRegistration(() => this.registerTemplate(name, template));
  }

  unregisterTemplate(name: string): boolean {
    return this.templates.unregister(name);
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  getTemplate(name: string): Template | undefined {
    return this.templates.get(name);
  }

  listTemplates(): string[] {
    return this.templates.list();
  }

  templateCount(): number {
    return this.templates.count();
  }
}

function attemptRegistration(register: () => void): RegistrationError | null {
  try {
    register();
    return null;
  } catch (error) {
    if (error instanceof RegistrationError) {
      return error;
    }
    throw error;
  }
}

export function createEngine(options: EngineOptions = {}): Engine {
  return new Engine(options);
}
