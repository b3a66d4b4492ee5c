import { DEFAULT_DELIMITERS, Lexer, type Delimiters } from '../lexer/lexer';
import type { SourceLocation, Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import type {
  CaseMatch,
  ConditionalBranch,
  ConditionalNode,
  LoopNode,
  Program,
  RawNode,
  Statement,
  SwitchCase,
  SwitchNode,
  TagNode,
  TextNode,
} from './ast-nodes';
import { Attributes } from './attributes';
import { ParserError } from './parser-error';

/** Names of the tags the parser turns into dedicated nodes */
export const TAG = {
  IF: 'prompty.if',
  ELSEIF: 'prompty.elseif',
  ELSE: 'prompty.else',
  FOR: 'prompty.for',
  SWITCH: 'prompty.switch',
  CASE: 'prompty.case',
  CASE_DEFAULT: 'prompty.casedefault',
  RAW: 'prompty.raw',
  COMMENT: 'prompty.comment',
} as const;

const NO_MARKERS: ReadonlySet<string> = new Set();
const BRANCH_MARKERS: ReadonlySet<string> = new Set([TAG.ELSEIF, TAG.ELSE]);
const NON_NEGATIVE_INTEGER = /^\d+$/;
const WHITESPACE_ONLY = /^\s*$/;

/**
 * An opening tag with its attributes, before its body is parsed
 */
interface TagHeader {
  openToken: Token;
  nameToken: Token;
  name: string;
  attributes: Attributes;
  selfClosing: boolean;
  /** CLOSE_TAG or SELF_CLOSE token */
  endToken: Token;
}

/**
 * The block a body belongs to, for unclosed-block errors
 */
interface BlockContext {
  name: string;
  openToken: Token;
}

/**
 * Parser for prompty templates
 *
 * Recursive descent over the token stream. Blocks parse children until the
 * close tag of the same name; control tags become dedicated nodes and
 * everything else is a generic Tag resolved at run time.
 */
export class Parser {
  private lexer: Lexer;
  private source: string = '';
  private tokens: Token[] = [];
  private position: number = 0;

  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  /**
   * Initialize parser with tokens from template
   */
  setInput(template: string): void {
    this.source = template;
    this.tokens = this.lexer.tokenize(template);
    this.position = 0;
  }

  /**
   * Parse a template string in one call
   *
   * @example
   * ```ts
   * const program = Parser.parse('Hello, {~prompty.var name="user" /~}!');
   * ```
   */
  static parse(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Program {
    const parser = new Parser(new Lexer(delimiters));
    parser.setInput(template);
    return parser.parse();
  }

  /**
   * Parse the whole input into a Program
   */
  parse(): Program {
    const startToken = this.current();
    const body = this.parseBody(null, NO_MARKERS);

    if (!this.match(TokenType.EOF)) {
      throw ParserError.fromToken('Unexpected content after template', this.current(), this.getErrorContext());
    }

    return {
      type: 'Program',
      body,
      loc: this.getSourceLocation(startToken, this.current()),
    };
  }

  // Token navigation

  private current(): Token {
    return this.tokens[Math.min(this.position, this.tokens.length - 1)];
  }

  private peek(offset: number = 1): Token | null {
    const peekPosition = this.position + offset;
    if (peekPosition >= 0 && peekPosition < this.tokens.length) {
      return this.tokens[peekPosition];
    }
    return null;
  }

  private advance(): Token {
    const token = this.current();
    if (this.position < this.tokens.length - 1) {
      this.position++;
    }
    return token;
  }

  private match(type: TokenType): boolean {
    return this.current().type === type;
  }

  /**
   * Assert the current token type and consume it
   */
  private expect(type: TokenType, message: string): Token {
    if (!this.match(type)) {
      throw ParserError.fromToken(message, this.current(), this.getErrorContext());
    }
    return this.advance();
  }

  /**
   * Surrounding tokens for error context (up to 2 before and 2 after)
   */
  private getErrorContext(): Token[] {
    const start = Math.max(0, this.position - 2);
    const end = Math.min(this.tokens.length, this.position + 3);
    return this.tokens.slice(start, end);
  }

  private getSourceLocation(startToken: Token, endToken?: Token): SourceLocation {
    const end = endToken ?? startToken;
    return {
      start: startToken.loc.start,
      end: end.loc.end,
    };
  }

  private sourceSlice(startToken: Token, endToken: Token): string {
    return this.source.slice(startToken.loc.start.index, endToken.loc.end.index);
  }

  private error(message: string, token: Token): ParserError {
    return ParserError.fromToken(message, token, this.getErrorContext());
  }

  // Statements

  /**
   * Parse statements until EOF, a closing tag, or an opening tag named in
   * `markers` (branch markers of the enclosing construct)
   */
  private parseBody(block: BlockContext | null, markers: ReadonlySet<string>): Statement[] {
    const body: Statement[] = [];

    for (;;) {
      const token = this.current();

      if (token.type === TokenType.EOF) {
        if (block) {
          throw this.error(
            `Unclosed block: ${block.name} opened at line ${block.openToken.loc.start.line} was never closed`,
            block.openToken,
          );
        }
        return body;
      }

      if (token.type === TokenType.OPEN_END_TAG) {
        if (!block) {
          const name = this.peek()?.value ?? '';
          throw this.error(`Unexpected closing tag for '${name}'`, token);
        }
        return body;
      }

      if (token.type === TokenType.TEXT) {
        body.push(this.parseText());
        continue;
      }

      if (token.type === TokenType.OPEN_TAG) {
        const name = this.peek()?.value ?? '';
        if (markers.has(name)) {
          return body;
        }
        const statement = this.parseTag();
        if (statement) {
          body.push(statement);
        }
        continue;
      }

      throw this.error(`Unexpected token ${token.type} in template body`, token);
    }
  }

  private parseText(): TextNode {
    const token = this.expect(TokenType.TEXT, 'Expected text');
    return { type: 'Text', value: token.value, loc: token.loc };
  }

  /**
   * Parse `{~name attr="v" ... ~}` or `/~}` up to and including its end
   */
  private parseTagHeader(): TagHeader {
    const openToken = this.expect(TokenType.OPEN_TAG, 'Expected tag');
    const nameToken = this.expect(TokenType.TAG_NAME, 'Expected tag name');
    const entries: Array<[string, string]> = [];
    const seen = new Set<string>();

    while (this.match(TokenType.ATTR_NAME)) {
      const attrToken = this.advance();
      if (seen.has(attrToken.value)) {
        throw this.error(`Duplicate attribute '${attrToken.value}' on ${nameToken.value}`, attrToken);
      }
      seen.add(attrToken.value);
      const valueToken = this.expect(TokenType.ATTR_VALUE, `Expected value for attribute '${attrToken.value}'`);
      entries.push([attrToken.value, valueToken.value]);
    }

    if (this.match(TokenType.SELF_CLOSE) || this.match(TokenType.CLOSE_TAG)) {
      const endToken = this.advance();
      return {
        openToken,
        nameToken,
        name: nameToken.value,
        attributes: new Attributes(entries),
        selfClosing: endToken.type === TokenType.SELF_CLOSE,
        endToken,
      };
    }

    throw this.error(`Expected end of tag ${nameToken.value}`, this.current());
  }

  /**
   * Parse `{~/name~}`, checking it closes the expected block
   */
  private parseCloseTag(block: BlockContext): Token {
    this.expect(
      TokenType.OPEN_END_TAG,
      `Expected closing tag for ${block.name} opened at line ${block.openToken.loc.start.line}`,
    );
    const nameToken = this.expect(TokenType.TAG_NAME, 'Expected tag name in closing tag');

    if (nameToken.value !== block.name) {
      throw this.error(
        `Block closing tag mismatch: expected ${block.name} but found ${nameToken.value} (block opened at line ${block.openToken.loc.start.line})`,
        nameToken,
      );
    }

    return this.expect(TokenType.CLOSE_TAG, `Expected end of closing tag ${block.name}`);
  }

  /**
   * Dispatch an opening tag. Returns null for comments.
   */
  private parseTag(): Statement | null {
    const header = this.parseTagHeader();

    switch (header.name) {
      case TAG.RAW:
        return this.parseRaw(header);
      case TAG.COMMENT:
        this.parseRaw(header);
        return null;
      case TAG.IF:
        return this.parseConditional(header);
      case TAG.FOR:
        return this.parseLoop(header);
      case TAG.SWITCH:
        return this.parseSwitch(header);
      case TAG.ELSEIF:
      case TAG.ELSE:
        throw this.error(`${header.name} is only allowed inside ${TAG.IF}`, header.openToken);
      case TAG.CASE:
      case TAG.CASE_DEFAULT:
        throw this.error(`${header.name} is only allowed inside ${TAG.SWITCH}`, header.openToken);
      default:
        return this.parseGenericTag(header);
    }
  }

  private parseGenericTag(header: TagHeader): TagNode {
    if (header.selfClosing) {
      return {
        type: 'Tag',
        name: header.name,
        attributes: header.attributes,
        children: null,
        selfClosing: true,
        raw: this.sourceSlice(header.openToken, header.endToken),
        loc: this.getSourceLocation(header.openToken, header.endToken),
      };
    }

    const block = { name: header.name, openToken: header.openToken };
    const children = this.parseBody(block, NO_MARKERS);
    const closeToken = this.parseCloseTag(block);

    return {
      type: 'Tag',
      name: header.name,
      attributes: header.attributes,
      children,
      selfClosing: false,
      raw: this.sourceSlice(header.openToken, closeToken),
      loc: this.getSourceLocation(header.openToken, closeToken),
    };
  }

  private parseRaw(header: TagHeader): RawNode {
    if (header.selfClosing) {
      return { type: 'Raw', value: '', loc: this.getSourceLocation(header.openToken, header.endToken) };
    }

    const body = this.expect(TokenType.RAW_TEXT, `Expected body of ${header.name}`);
    const closeToken = this.parseCloseTag({ name: header.name, openToken: header.openToken });

    return { type: 'Raw', value: body.value, loc: this.getSourceLocation(header.openToken, closeToken) };
  }

  private requireBlock(header: TagHeader): BlockContext {
    if (header.selfClosing) {
      throw this.error(`${header.name} must be a block tag`, header.openToken);
    }
    return { name: header.name, openToken: header.openToken };
  }

  private requireAttribute(header: TagHeader, name: string): string {
    const value = header.attributes.get(name);
    if (value === undefined) {
      throw this.error(`${header.name} requires the '${name}' attribute`, header.openToken);
    }
    return value;
  }

  private parseConditional(header: TagHeader): ConditionalNode {
    const block = this.requireBlock(header);
    const branches: ConditionalBranch[] = [];
    let branchHeader = header;
    let condition: string | null = this.requireAttribute(header, 'eval');

    for (;;) {
      const body = this.parseBody(block, BRANCH_MARKERS);
      branches.push({
        condition,
        attributes: branchHeader.attributes,
        body,
        loc: this.getSourceLocation(branchHeader.openToken, this.tokens[Math.max(0, this.position - 1)]),
      });

      if (!this.match(TokenType.OPEN_TAG)) {
        break;
      }

      // At an elseif/else marker
      const previousWasElse = condition === null;
      branchHeader = this.parseTagHeader();

      if (previousWasElse) {
        const message =
          branchHeader.name === TAG.ELSE
            ? `Duplicate ${TAG.ELSE} in ${TAG.IF}`
            : `${TAG.ELSEIF} after ${TAG.ELSE}`;
        throw this.error(message, branchHeader.openToken);
      }

      if (branchHeader.name === TAG.ELSE) {
        if (branchHeader.attributes.has('eval')) {
          throw this.error(`${TAG.ELSE} does not take an 'eval' attribute`, branchHeader.openToken);
        }
        condition = null;
      } else {
        condition = this.requireAttribute(branchHeader, 'eval');
      }
    }

    const closeToken = this.parseCloseTag(block);

    return {
      type: 'Conditional',
      branches,
      attributes: header.attributes,
      raw: this.sourceSlice(header.openToken, closeToken),
      loc: this.getSourceLocation(header.openToken, closeToken),
    };
  }

  private parseLoop(header: TagHeader): LoopNode {
    const block = this.requireBlock(header);
    const item = this.requireAttribute(header, 'item');
    const collection = this.requireAttribute(header, 'in');
    const index = header.attributes.get('index') ?? null;
    const limitText = header.attributes.get('limit');

    let limit: number | null = null;
    if (limitText !== undefined) {
      if (!NON_NEGATIVE_INTEGER.test(limitText)) {
        throw this.error(
          `${TAG.FOR} limit must be a non-negative integer, got '${limitText}'`,
          header.openToken,
        );
      }
      limit = parseInt(limitText, 10);
    }

    const body = this.parseBody(block, NO_MARKERS);
    const closeToken = this.parseCloseTag(block);

    return {
      type: 'Loop',
      item,
      index,
      collection,
      limit,
      body,
      attributes: header.attributes,
      raw: this.sourceSlice(header.openToken, closeToken),
      loc: this.getSourceLocation(header.openToken, closeToken),
    };
  }

  private parseSwitch(header: TagHeader): SwitchNode {
    const block = this.requireBlock(header);
    const expression = this.requireAttribute(header, 'eval');
    const cases: SwitchCase[] = [];
    let defaultCase: Statement[] | null = null;

    for (;;) {
      const token = this.current();

      if (token.type === TokenType.EOF) {
        throw this.error(
          `Unclosed block: ${block.name} opened at line ${block.openToken.loc.start.line} was never closed`,
          block.openToken,
        );
      }

      if (token.type === TokenType.OPEN_END_TAG) {
        break;
      }

      if (token.type === TokenType.TEXT) {
        if (!WHITESPACE_ONLY.test(token.value)) {
          throw this.error(`Only ${TAG.CASE} and ${TAG.CASE_DEFAULT} may appear inside ${TAG.SWITCH}`, token);
        }
        this.advance();
        continue;
      }

      const name = this.peek()?.value ?? '';
      if (name === TAG.COMMENT) {
        this.parseTag();
        continue;
      }
      if (name !== TAG.CASE && name !== TAG.CASE_DEFAULT) {
        throw this.error(`Only ${TAG.CASE} and ${TAG.CASE_DEFAULT} may appear inside ${TAG.SWITCH}`, token);
      }

      const caseHeader = this.parseTagHeader();
      if (defaultCase !== null) {
        const message =
          caseHeader.name === TAG.CASE_DEFAULT
            ? `Duplicate ${TAG.CASE_DEFAULT} in ${TAG.SWITCH}`
            : `${TAG.CASE_DEFAULT} must be the last case in ${TAG.SWITCH}`;
        throw this.error(message, caseHeader.openToken);
      }

      const { body, endToken } = this.parseCaseBody(caseHeader);

      if (caseHeader.name === TAG.CASE_DEFAULT) {
        defaultCase = body;
      } else {
        cases.push({
          match: this.parseCaseMatch(caseHeader),
          body,
          loc: this.getSourceLocation(caseHeader.openToken, endToken),
        });
      }
    }

    const closeToken = this.parseCloseTag(block);

    return {
      type: 'Switch',
      expression,
      cases,
      defaultCase,
      attributes: header.attributes,
      raw: this.sourceSlice(header.openToken, closeToken),
      loc: this.getSourceLocation(header.openToken, closeToken),
    };
  }

  private parseCaseBody(header: TagHeader): { body: Statement[]; endToken: Token } {
    if (header.selfClosing) {
      return { body: [], endToken: header.endToken };
    }
    const block = { name: header.name, openToken: header.openToken };
    const body = this.parseBody(block, NO_MARKERS);
    const endToken = this.parseCloseTag(block);
    return { body, endToken };
  }

  private parseCaseMatch(header: TagHeader): CaseMatch {
    const value = header.attributes.get('value');
    const expression = header.attributes.get('eval');

    if (value !== undefined && expression === undefined) {
      return { kind: 'value', value };
    }
    if (expression !== undefined && value === undefined) {
      return { kind: 'eval', expression };
    }
    throw this.error(`${TAG.CASE} requires exactly one of 'value' or 'eval'`, header.openToken);
  }
}
