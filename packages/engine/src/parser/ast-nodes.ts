/**
 * AST node types for the template parser
 *
 * The tree is plain data with no parent pointers. Tag-like nodes keep the
 * exact source slice they were parsed from in `raw`.
 */

import type { SourceLocation } from '../lexer/token';
import type { Attributes } from './attributes';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  type: string;
  loc: SourceLocation;
}

/**
 * Root of a parsed template
 */
export interface Program extends Node {
  type: 'Program';
  body: Statement[];
}

/**
 * Plain text, escapes already applied
 */
export interface TextNode extends Node {
  type: 'Text';
  value: string;
}

/**
 * Resolver tag: `{~name attr="v" /~}` or `{~name~}children{~/name~}`
 */
export interface TagNode extends Node {
  type: 'Tag';
  name: string;
  attributes: Attributes;
  /** null for self-closing tags */
  children: Statement[] | null;
  selfClosing: boolean;
  raw: string;
}

export interface ConditionalBranch {
  /** Expression source; null for the else branch */
  condition: string | null;
  attributes: Attributes;
  body: Statement[];
  loc: SourceLocation;
}

/**
 * `prompty.if` with optional `prompty.elseif` and `prompty.else` branches
 */
export interface ConditionalNode extends Node {
  type: 'Conditional';
  branches: ConditionalBranch[];
  /** Attributes of the opening prompty.if tag */
  attributes: Attributes;
  raw: string;
}

/**
 * `prompty.for item="x" index="i" in="path" limit="n"`
 */
export interface LoopNode extends Node {
  type: 'Loop';
  item: string;
  index: string | null;
  collection: string;
  limit: number | null;
  body: Statement[];
  attributes: Attributes;
  raw: string;
}

export type CaseMatch = { kind: 'value'; value: string } | { kind: 'eval'; expression: string };

export interface SwitchCase {
  match: CaseMatch;
  body: Statement[];
  loc: SourceLocation;
}

/**
 * `prompty.switch` with ordered cases and an optional trailing default
 */
export interface SwitchNode extends Node {
  type: 'Switch';
  expression: string;
  cases: SwitchCase[];
  defaultCase: Statement[] | null;
  attributes: Attributes;
  raw: string;
}

/**
 * Verbatim text from a `prompty.raw` block
 */
export interface RawNode extends Node {
  type: 'Raw';
  value: string;
}

export type Statement = TextNode | TagNode | ConditionalNode | LoopNode | SwitchNode | RawNode;

/**
 * Nodes that an error strategy can act on
 */
export type TagLikeNode = TagNode | ConditionalNode | LoopNode | SwitchNode;
