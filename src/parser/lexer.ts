/**
 * Tokenizer for LineScript
 *
 * Turns one line of source text into a pull-based stream of tokens. The
 * parser holds a single token of lookahead (`current()`) and asks for the
 * next one with `advance()`. The stream always ends with an EOF token, and
 * once a lex error is hit it is returned for every later request on that
 * line.
 */

import { LexError } from "../errors.js";
import { err, ok, type Result } from "../shared/result.js";

export enum TokenType {
  // End of input
  EOF = "EOF",

  // Literals
  NUMBER = "NUMBER",
  STRING = "STRING",
  TRUE = "TRUE",
  FALSE = "FALSE",

  // Names
  IDENT = "IDENT",
  PRINT = "PRINT",

  // Arithmetic
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",

  // Grouping and separators
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  SEMICOLON = "SEMICOLON",

  // Assignment and comparison
  ASSIGN = "ASSIGN", // =
  EQ = "EQ", // ==
  NE = "NE", // !=
  LT = "LT",
  GT = "GT",

  // Logical
  AND = "AND", // and, &
  OR = "OR", // or, |
  NOT = "NOT", // !
}

interface TokenBase {
  /** 0-based offset of the token's first character */
  column: number;
}

/** Token types whose payload is just the matched source text */
export type SymbolTokenType = Exclude<
  TokenType,
  | TokenType.NUMBER
  | TokenType.STRING
  | TokenType.IDENT
  | TokenType.TRUE
  | TokenType.FALSE
>;

export type Token =
  /** Numeric text as written; converted to a float by the parser */
  | (TokenBase & { type: TokenType.NUMBER; value: string })
  /** Raw string contents without the quotes */
  | (TokenBase & { type: TokenType.STRING; value: string })
  | (TokenBase & { type: TokenType.IDENT; value: string })
  | (TokenBase & { type: TokenType.TRUE | TokenType.FALSE; value: boolean })
  | (TokenBase & { type: SymbolTokenType; value: string });

const KEYWORDS = new Map<string, TokenType>([
  ["true", TokenType.TRUE],
  ["false", TokenType.FALSE],
  ["and", TokenType.AND],
  ["or", TokenType.OR],
  ["print", TokenType.PRINT],
]);

const SINGLE_CHAR_TOKENS = new Map<string, SymbolTokenType>([
  ["+", TokenType.PLUS],
  ["*", TokenType.STAR],
  ["/", TokenType.SLASH],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  [";", TokenType.SEMICOLON],
  ["<", TokenType.LT],
  [">", TokenType.GT],
  ["&", TokenType.AND],
  ["|", TokenType.OR],
]);

export class Tokenizer {
  private readonly input: string;
  private pos = 0;
  private lookahead: Result<Token, LexError>;

  constructor(input: string) {
    this.input = input;
    this.lookahead = this.scan();
  }

  /** The lookahead token, or the error that stopped the scan. */
  current(): Result<Token, LexError> {
    return this.lookahead;
  }

  /**
   * Move to the next token and return it. Advancing past EOF yields EOF
   * again; advancing after an error yields the same error.
   */
  advance(): Result<Token, LexError> {
    if (this.lookahead.ok && this.lookahead.value.type !== TokenType.EOF) {
      this.lookahead = this.scan();
    }
    return this.lookahead;
  }

  private peek(offset = 0): string {
    return this.input[this.pos + offset] ?? "";
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && isWhitespace(this.peek())) {
      this.pos++;
    }
  }

  private scan(): Result<Token, LexError> {
    this.skipWhitespace();

    const column = this.pos;
    if (this.pos >= this.input.length) {
      return ok<Token>({ type: TokenType.EOF, value: "", column });
    }

    const ch = this.peek();

    if (isDigit(ch)) {
      return ok(this.readNumber());
    }

    if (isLetter(ch)) {
      return ok(this.readWord());
    }

    if (ch === '"') {
      return this.readString();
    }

    return this.readOperator();
  }

  /**
   * Digits and decimal points, optionally after a leading minus. The text is
   * not validated here: "1.2.3" comes out as one NUMBER token.
   */
  private readNumber(): Token {
    const column = this.pos;
    if (this.peek() === "-") {
      this.pos++;
    }
    while (isDigit(this.peek()) || this.peek() === ".") {
      this.pos++;
    }
    return {
      type: TokenType.NUMBER,
      value: this.input.slice(column, this.pos),
      column,
    };
  }

  private readWord(): Token {
    const column = this.pos;
    while (isLetter(this.peek()) || isDigit(this.peek())) {
      this.pos++;
    }
    const word = this.input.slice(column, this.pos);

    switch (KEYWORDS.get(word)) {
      case TokenType.TRUE:
        return { type: TokenType.TRUE, value: true, column };
      case TokenType.FALSE:
        return { type: TokenType.FALSE, value: false, column };
      case TokenType.AND:
        return { type: TokenType.AND, value: word, column };
      case TokenType.OR:
        return { type: TokenType.OR, value: word, column };
      case TokenType.PRINT:
        return { type: TokenType.PRINT, value: word, column };
      default:
        return { type: TokenType.IDENT, value: word, column };
    }
  }

  /** No escape sequences: everything up to the next quote is the value. */
  private readString(): Result<Token, LexError> {
    const column = this.pos;
    this.pos++; // opening quote
    const start = this.pos;

    while (this.pos < this.input.length && this.peek() !== '"') {
      this.pos++;
    }

    if (this.pos >= this.input.length) {
      return err(
        new LexError(
          "unterminated-string",
          "Unterminated string literal",
          column,
        ),
      );
    }

    const value = this.input.slice(start, this.pos);
    this.pos++; // closing quote
    return ok<Token>({ type: TokenType.STRING, value, column });
  }

  private readOperator(): Result<Token, LexError> {
    const column = this.pos;
    const ch = this.peek();

    const single = SINGLE_CHAR_TOKENS.get(ch);
    if (single) {
      this.pos++;
      return ok<Token>({ type: single, value: ch, column });
    }

    switch (ch) {
      case "-":
        if (isDigit(this.peek(1))) {
          return ok(this.readNumber());
        }
        this.pos++;
        return ok<Token>({ type: TokenType.MINUS, value: "-", column });

      case "!":
        if (this.peek(1) === "=") {
          this.pos += 2;
          return ok<Token>({ type: TokenType.NE, value: "!=", column });
        }
        this.pos++;
        return ok<Token>({ type: TokenType.NOT, value: "!", column });

      case "=":
        if (this.peek(1) === "=") {
          this.pos += 2;
          return ok<Token>({ type: TokenType.EQ, value: "==", column });
        }
        this.pos++;
        return ok<Token>({ type: TokenType.ASSIGN, value: "=", column });

      default: {
        const codePoint = this.input.codePointAt(this.pos) ?? 0;
        return err(
          new LexError(
            "unexpected-character",
            `Unexpected character: ${String.fromCodePoint(codePoint)}`,
            column,
          ),
        );
      }
    }
  }
}

/**
 * Scan a whole line, EOF included.
 */
export function tokenize(input: string): Result<Token[], LexError> {
  const tokenizer = new Tokenizer(input);
  const tokens: Token[] = [];
  let next = tokenizer.current();

  while (next.ok) {
    tokens.push(next.value);
    if (next.value.type === TokenType.EOF) {
      return ok(tokens);
    }
    next = tokenizer.advance();
  }

  return next;
}

/**
 * Human-readable token description for error messages.
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return "end of input";
    case TokenType.NUMBER:
      return `number ${token.value}`;
    case TokenType.STRING:
      return `string "${token.value}"`;
    case TokenType.IDENT:
      return `identifier '${token.value}'`;
    case TokenType.TRUE:
    case TokenType.FALSE:
      return `'${token.value}'`;
    default:
      return `'${token.value}'`;
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isLetter(ch: string): boolean {
  return ch !== "" && /\p{L}/u.test(ch);
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}
