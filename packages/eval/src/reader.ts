/**
 * S-Expression Reader
 *
 * Turns source text into expressions:
 * - Numbers: 42, -5, 3.14
 * - Strings: "text" with \n \t \r \\ \" escapes
 * - Booleans: #t, #f, #true, #false
 * - Symbols: anything else made of symbol characters
 * - Lists: (a b c)
 * - Quote shorthand: 'x -> (quote x)
 */

import {
  type Expression,
  type SourceLocation,
  CircletError,
  ErrorCode,
  Num,
  Str,
  Bool,
  Sym,
  List,
  Errors,
} from "@circlet/core";

/**
 * Read every expression in source
 */
export function read(source: string, file?: string): Expression[] {
  const reader = new Reader(source, file);
  return reader.readAll();
}

/**
 * Read exactly one expression
 */
export function readOne(source: string, file?: string): Expression {
  const reader = new Reader(source, file);
  const expr = reader.readExpr();
  reader.expectEnd();
  return expr;
}

/**
 * Whether source holds only complete expressions. An unclosed list or
 * string means more input is needed; any other read error is left for
 * read to report.
 */
export function isComplete(source: string): boolean {
  try {
    read(source);
    return true;
  } catch (error) {
    if (!(error instanceof CircletError)) throw error;
    return error.code !== ErrorCode.UNEXPECTED_EOF && error.code !== ErrorCode.UNTERMINATED_STRING;
  }
}

const DELIMITERS = new Set(["(", ")", "'", '"', ";"]);

class Reader {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(
    private readonly source: string,
    private readonly file?: string
  ) {}

  readAll(): Expression[] {
    const exprs: Expression[] = [];
    this.skipWhitespaceAndComments();
    while (!this.isAtEnd()) {
      exprs.push(this.readExpr());
      this.skipWhitespaceAndComments();
    }
    return exprs;
  }

  expectEnd(): void {
    this.skipWhitespaceAndComments();
    if (!this.isAtEnd()) {
      throw Errors.unexpectedToken(this.peek(), this.location());
    }
  }

  readExpr(): Expression {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      throw Errors.unexpectedEof(this.location());
    }

    const ch = this.peek();

    if (ch === "(") {
      return this.readList();
    }

    if (ch === ")") {
      throw Errors.unexpectedToken(ch, this.location());
    }

    // Quote shorthand: 'x -> (quote x)
    if (ch === "'") {
      this.advance();
      return List(Sym("quote"), this.readExpr());
    }

    if (ch === '"') {
      return this.readString();
    }

    return this.readAtom();
  }

  private readList(): Expression {
    this.advance(); // consume '('
    const elements: Expression[] = [];

    this.skipWhitespaceAndComments();
    while (!this.isAtEnd() && this.peek() !== ")") {
      elements.push(this.readExpr());
      this.skipWhitespaceAndComments();
    }

    if (this.isAtEnd()) {
      throw Errors.unexpectedEof(this.location());
    }
    this.advance(); // consume ')'

    return List(...elements);
  }

  private readString(): Expression {
    const start = this.location();
    this.advance(); // consume opening "
    let value = "";

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === "\\") {
        this.advance();
        if (this.isAtEnd()) {
          break;
        }
        const escaped = this.advance();
        switch (escaped) {
          case "n": value += "\n"; break;
          case "t": value += "\t"; break;
          case "r": value += "\r"; break;
          default: value += escaped;
        }
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw Errors.unterminatedString(start);
    }
    this.advance(); // consume closing "

    return Str(value);
  }

  private readAtom(): Expression {
    const start = this.location();
    let text = "";
    while (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
      text += this.advance();
    }

    if (text.startsWith("#")) {
      switch (text) {
        case "#t":
        case "#true":
          return Bool(true);
        case "#f":
        case "#false":
          return Bool(false);
        default:
          throw Errors.invalidLiteral(text, start);
      }
    }

    if (/^[+-]?(\d+\.?\d*|\.\d+)$/.test(text)) {
      return Num(parseFloat(text));
    }

    return Sym(text);
  }

  private isDelimiter(ch: string): boolean {
    return DELIMITERS.has(ch) || /\s/.test(ch);
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();
      if (/\s/.test(ch)) {
        this.advance();
      } else if (ch === ";") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private location(): SourceLocation {
    return { line: this.line, column: this.column, file: this.file };
  }

  private peek(): string {
    return this.source[this.pos];
  }

  private advance(): string {
    const ch = this.source[this.pos++];
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }
}
