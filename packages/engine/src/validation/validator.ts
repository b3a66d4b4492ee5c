/**
 * Static checks over a template without executing it
 */

import { ExpressionError } from '@prompty/expressions';
import { isErrorStrategy } from '../context';
import { EngineError } from '../errors';
import type { Delimiters } from '../lexer/lexer';
import type { Position } from '../lexer/token';
import type { Statement, TagNode } from '../parser/ast-nodes';
import type { Attributes } from '../parser/attributes';
import { Parser } from '../parser/parser';
import type { ResolverRegistry } from '../registry/resolver-registry';
import type { TemplateRegistry } from '../registry/template-registry';
import { CONTENT_ATTRIBUTE } from '../resolvers/types';
import { findSimilar } from '../suggestions';
import type { ExpressionCache } from '../interpreter/expression-cache';

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
  severity: IssueSeverity;
  message: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export interface ValidationResult {
  /** False when any issue is an error */
  valid: boolean;
  issues: ValidationIssue[];
}

export interface ValidatorOptions {
  delimiters: Readonly<Delimiters>;
  resolvers: ResolverRegistry;
  templates: TemplateRegistry;
  expressions: ExpressionCache;
}

/**
 * Collects issues for one source string
 */
export class Validator {
  private readonly options: ValidatorOptions;
  private issues: ValidationIssue[] = [];

  constructor(options: ValidatorOptions) {
    this.options = options;
  }

  validate(source: string): ValidationResult {
    this.issues = [];

    try {
      const program = Parser.parse(source, this.options.delimiters);
      this.checkBody(program.body);
    } catch (error) {
      if (!(error instanceof EngineError)) {
        throw error;
      }
      this.issues.push({ severity: 'error', message: error.detail, line: error.line, column: error.column + 1 });
    }

    return {
      valid: !this.issues.some((issue) => issue.severity === 'error'),
      issues: this.issues,
    };
  }

  private report(severity: IssueSeverity, message: string, position: Position): void {
    this.issues.push({ severity, message, line: position.line, column: position.column + 1 });
  }

  private checkBody(statements: readonly Statement[]): void {
    for (const statement of statements) {
      this.checkStatement(statement);
    }
  }

  private checkStatement(statement: Statement): void {
    switch (statement.type) {
      case 'Text':
      case 'Raw':
        return;

      case 'Tag':
        this.checkOnError(statement.name, statement.attributes, statement.loc.start);
        this.checkTag(statement);
        if (statement.children !== null) {
          this.checkBody(statement.children);
        }
        return;

      case 'Conditional':
        this.checkOnError('prompty.if', statement.attributes, statement.loc.start);
        for (const branch of statement.branches) {
          if (branch.condition !== null) {
            this.checkExpression(branch.condition, branch.loc.start);
          }
          this.checkBody(branch.body);
        }
        return;

      case 'Loop':
        this.checkOnError('prompty.for', statement.attributes, statement.loc.start);
        this.checkBody(statement.body);
        return;

      case 'Switch':
        this.checkOnError('prompty.switch', statement.attributes, statement.loc.start);
        this.checkExpression(statement.expression, statement.loc.start);
        for (const switchCase of statement.cases) {
          if (switchCase.match.kind === 'eval') {
            this.checkExpression(switchCase.match.expression, switchCase.loc.start);
          }
          this.checkBody(switchCase.body);
        }
        if (statement.defaultCase !== null) {
          this.checkBody(statement.defaultCase);
        }
        return;
    }
  }

  private checkTag(node: TagNode): void {
    const position = node.loc.start;
    const resolver = this.options.resolvers.get(node.name);

    if (!resolver) {
      const suggestions = findSimilar(node.name, this.options.resolvers.list());
      const hint = suggestions.length > 0 ? ` (did you mean: ${suggestions.join(', ')}?)` : '';
      this.report('warning', `unknown tag '${node.name}'${hint}`, position);
      return;
    }

    const attributes = node.children === null ? node.attributes : node.attributes.with(CONTENT_ATTRIBUTE, '');
    try {
      resolver.validate(attributes);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.report('error', `${node.name}: ${message}`, position);
    }

    if (node.children !== null && !resolver.acceptsContent) {
      this.report('info', `${node.name} ignores its block content`, position);
    }

    if (node.name === 'prompty.include') {
      const template = node.attributes.get('template');
      if (template && !this.options.templates.has(template)) {
        this.report('warning', `template '${template}' is not registered`, position);
      }
    }
  }

  private checkOnError(tagName: string, attributes: Attributes, position: Position): void {
    const onerror = attributes.get('onerror');
    if (onerror !== undefined && !isErrorStrategy(onerror)) {
      this.report(
        'error',
        `${tagName}: invalid onerror value '${onerror}' (expected throw, default, remove, keepraw or log)`,
        position,
      );
    }
  }

  private checkExpression(expression: string, position: Position): void {
    try {
      this.options.expressions.get(expression);
    } catch (error) {
      if (!(error instanceof ExpressionError)) {
        throw error;
      }
      this.report('error', `Invalid expression '${expression}': ${error.message}`, position);
    }
  }
}
