import { describe, expect, it } from "vitest";
import { LexError } from "../errors.js";
import { describeToken, type Token, Tokenizer, tokenize, TokenType } from "./lexer.js";

function tokensOf(input: string): Token[] {
  const result = tokenize(input);
  if (!result.ok) {
    throw new Error(`unexpected lex error: ${result.error.message}`);
  }
  return result.value;
}

function typesOf(input: string): TokenType[] {
  return tokensOf(input).map((t) => t.type);
}

function lexErrorOf(input: string): LexError {
  const result = tokenize(input);
  if (result.ok) {
    throw new Error(`expected a lex error for ${input}`);
  }
  return result.error;
}

describe("tokenize", () => {
  it("should tokenize an assignment with columns", () => {
    expect(tokensOf("x = 1.5;")).toEqual([
      { type: TokenType.IDENT, value: "x", column: 0 },
      { type: TokenType.ASSIGN, value: "=", column: 2 },
      { type: TokenType.NUMBER, value: "1.5", column: 4 },
      { type: TokenType.SEMICOLON, value: ";", column: 7 },
      { type: TokenType.EOF, value: "", column: 8 },
    ]);
  });

  it("should always end with EOF", () => {
    expect(tokensOf("")).toEqual([{ type: TokenType.EOF, value: "", column: 0 }]);
    expect(tokensOf("   ")).toEqual([
      { type: TokenType.EOF, value: "", column: 3 },
    ]);
  });

  it("should prefer two-character operators", () => {
    expect(typesOf("a==b != c")).toEqual([
      TokenType.IDENT,
      TokenType.EQ,
      TokenType.IDENT,
      TokenType.NE,
      TokenType.IDENT,
      TokenType.EOF,
    ]);
    expect(typesOf("!x = y")).toEqual([
      TokenType.NOT,
      TokenType.IDENT,
      TokenType.ASSIGN,
      TokenType.IDENT,
      TokenType.EOF,
    ]);
  });

  it("should tokenize every single-character symbol", () => {
    expect(typesOf("+ * / ( ) ; < > & |")).toEqual([
      TokenType.PLUS,
      TokenType.STAR,
      TokenType.SLASH,
      TokenType.LPAREN,
      TokenType.RPAREN,
      TokenType.SEMICOLON,
      TokenType.LT,
      TokenType.GT,
      TokenType.AND,
      TokenType.OR,
      TokenType.EOF,
    ]);
  });

  describe("numbers", () => {
    it("should read a minus directly before a digit as part of the number", () => {
      const tokens = tokensOf("print -3 - 2");
      expect(tokens[1]).toEqual({ type: TokenType.NUMBER, value: "-3", column: 6 });
      expect(tokens[2]).toEqual({ type: TokenType.MINUS, value: "-", column: 9 });
      expect(tokens[3]).toEqual({ type: TokenType.NUMBER, value: "2", column: 11 });
    });

    it("should lex 3-2 as two numbers", () => {
      expect(tokensOf("3-2").slice(0, 2)).toEqual([
        { type: TokenType.NUMBER, value: "3", column: 0 },
        { type: TokenType.NUMBER, value: "-2", column: 1 },
      ]);
    });

    it("should never treat plus as a sign", () => {
      expect(typesOf("+5")).toEqual([
        TokenType.PLUS,
        TokenType.NUMBER,
        TokenType.EOF,
      ]);
    });

    it("should keep malformed numeric text for the parser to reject", () => {
      expect(tokensOf("1.2.3")[0]).toEqual({
        type: TokenType.NUMBER,
        value: "1.2.3",
        column: 0,
      });
    });
  });

  describe("words", () => {
    it("should recognize keywords case-sensitively", () => {
      const tokens = tokensOf("true and False or print");
      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.TRUE,
        TokenType.AND,
        TokenType.IDENT,
        TokenType.OR,
        TokenType.PRINT,
        TokenType.EOF,
      ]);
      expect(tokens[0].value).toBe(true);
      expect(tokens[2].value).toBe("False");
    });

    it("should treat not as an ordinary identifier", () => {
      expect(tokensOf("not")[0]).toEqual({
        type: TokenType.IDENT,
        value: "not",
        column: 0,
      });
    });

    it("should accept non-ASCII letters and trailing digits", () => {
      expect(tokensOf("café2 = 1;")[0]).toEqual({
        type: TokenType.IDENT,
        value: "café2",
        column: 0,
      });
    });

    it("should split a word from an adjacent symbol", () => {
      expect(typesOf("x+y")).toEqual([
        TokenType.IDENT,
        TokenType.PLUS,
        TokenType.IDENT,
        TokenType.EOF,
      ]);
    });
  });

  describe("strings", () => {
    it("should keep contents verbatim without the quotes", () => {
      expect(tokensOf('"hello  world"')[0]).toEqual({
        type: TokenType.STRING,
        value: "hello  world",
        column: 0,
      });
    });

    it("should allow an empty string", () => {
      expect(tokensOf('""')[0]).toEqual({
        type: TokenType.STRING,
        value: "",
        column: 0,
      });
    });

    it("should report an unterminated string at its opening quote", () => {
      const error = lexErrorOf('print "abc;');
      expect(error.code).toBe("unterminated-string");
      expect(error.message).toBe("Unterminated string literal");
      expect(error.column).toBe(6);
    });
  });

  describe("errors", () => {
    it("should reject unknown characters", () => {
      const error = lexErrorOf("x @ 1");
      expect(error).toBeInstanceOf(LexError);
      expect(error.code).toBe("unexpected-character");
      expect(error.message).toBe("Unexpected character: @");
      expect(error.column).toBe(2);
    });

    it("should not treat underscore as a letter", () => {
      expect(lexErrorOf("_x").message).toBe("Unexpected character: _");
    });

    it("should report a whole astral character", () => {
      expect(lexErrorOf("1 + 😀").message).toBe("Unexpected character: 😀");
    });
  });
});

describe("Tokenizer", () => {
  it("should keep returning EOF once reached", () => {
    const tokenizer = new Tokenizer("x");
    const eof = tokenizer.advance();
    expect(eof.ok && eof.value.type).toBe(TokenType.EOF);
    const again = tokenizer.advance();
    expect(again.ok && again.value.type).toBe(TokenType.EOF);
  });

  it("should keep returning the same error once one occurred", () => {
    const tokenizer = new Tokenizer("1 @ 2");
    const first = tokenizer.current();
    expect(first.ok).toBe(true);

    const failed = tokenizer.advance();
    const again = tokenizer.advance();
    expect(failed.ok).toBe(false);
    expect(again).toBe(failed);
    expect(tokenizer.current()).toBe(failed);
  });

  it("should surface an error in the first token immediately", () => {
    const current = new Tokenizer("$").current();
    expect(current.ok).toBe(false);
    if (!current.ok) {
      expect(current.error.column).toBe(0);
    }
  });
});

describe("describeToken", () => {
  it("should describe each token kind", () => {
    const [num, str, ident, bool, semi, eof] = tokensOf('-4 "hi" x true ;');
    expect(describeToken(num)).toBe("number -4");
    expect(describeToken(str)).toBe('string "hi"');
    expect(describeToken(ident)).toBe("identifier 'x'");
    expect(describeToken(bool)).toBe("'true'");
    expect(describeToken(semi)).toBe("';'");
    expect(describeToken(eof)).toBe("end of input");
  });
});
