/**
 * Expression Lexer
 *
 * Scans the right-hand side of an assignment into numbers, words and
 * operators. Whitespace is removed before scanning; any character that is
 * none of those is dropped without producing a token.
 */

export enum TokenType {
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',
  OPERATOR = 'OPERATOR',
}

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

export type Operator = '+' | '-' | '*' | '/';

const OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/']);

const DECIMAL_DIGIT = /^\p{Nd}$/u;
const WORD_CHAR = /^[\p{L}\p{N}_]$/u;
const LETTERS = /^\p{L}+$/u;

export function isOperator(value: string): value is Operator {
  return OPERATORS.has(value);
}

export class Lexer {
  // One entry per code point
  private source: string[];
  private pos: number = 0;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = Array.from(source.replace(/\s+/g, ''));
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): string {
    return this.source[this.pos++];
  }

  private scanToken(): void {
    const char = this.peek();

    if (this.isDigit(char)) {
      // Digit runs win over word runs, so "3x" is "3" then "x"
      this.push(TokenType.NUMBER, this.scanWhile((c) => this.isDigit(c)));
    } else if (this.isWordChar(char)) {
      this.push(TokenType.IDENTIFIER, this.scanWhile((c) => this.isWordChar(c)));
    } else if (isOperator(char)) {
      this.push(TokenType.OPERATOR, this.advance());
    } else {
      this.advance();
    }
  }

  private scanWhile(accept: (char: string) => boolean): string {
    let text = '';
    while (!this.isAtEnd() && accept(this.peek())) {
      text += this.advance();
    }
    return text;
  }

  private push(type: TokenType, value: string): void {
    this.tokens.push({ type, value, position: this.tokens.length });
  }

  private isDigit(char: string): boolean {
    return DECIMAL_DIGIT.test(char);
  }

  private isWordChar(char: string): boolean {
    return WORD_CHAR.test(char);
  }
}

/**
 * A token may stand where an operand is expected when it is a digit run or
 * a word made of letters only. Letters and digits of any script count.
 */
export function isOperand(token: Token): boolean {
  if (token.type === TokenType.NUMBER) return true;
  return token.type === TokenType.IDENTIFIER && LETTERS.test(token.value);
}
