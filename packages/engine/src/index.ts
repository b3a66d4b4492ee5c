/**
 * @prompty/engine
 *
 * Templating DSL for assembling LLM prompts: `{~tag attr="value" /~}` tags,
 * pluggable resolvers, a sandboxed condition language and bounded
 * execution.
 */

export { createEngine, Engine } from './engine';
export { Template } from './template';
export { DEFAULT_LIMITS, EngineOptionsSchema, resolveEngineOptions } from './config';
export type { EngineConfig, EngineOptions, Limits } from './config';
export { ERROR_STRATEGIES, ExecutionContext, isErrorStrategy } from './context';
export type { ChildOptions, ErrorStrategy, LookupResult } from './context';
export {
  CancellationError,
  CircularIncludeError,
  ConfigurationError,
  EngineError,
  ExpressionEvaluationError,
  RegistrationError,
  ResolverError,
  ResourceLimitError,
} from './errors';
export type { LimitName, RegistrationKind } from './errors';
export { DEFAULT_DELIMITERS, Lexer, LexerError, TokenType } from './lexer/index';
export type { Delimiters, Position, SourceLocation, Token } from './lexer/index';
export { Attributes, Parser, ParserError, TAG } from './parser/index';
export type * from './parser/ast-nodes';
export { ExpressionCache } from './interpreter/expression-cache';
export type { ExecuteOptions } from './interpreter/executor';
export { ResolverRegistry, TemplateRegistry } from './registry/index';
export {
  builtinResolvers,
  CONTENT_ATTRIBUTE,
  envResolver,
  includeResolver,
  RESERVED_PREFIX,
  VALUE_KEY,
  varResolver,
} from './resolvers/index';
export type { Resolver, ResolverRuntime, TagInfo } from './resolvers/index';
export type { IssueSeverity, ValidationIssue, ValidationResult } from './validation/index';
export { findSimilar } from './suggestions';
export { VARIADIC } from '@prompty/expressions';
export type { ExpressionFunction } from '@prompty/expressions';
