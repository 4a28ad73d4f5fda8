/**
 * RTL Translator
 *
 * Turns a single assignment such as `x = a + 3 * b` into register transfer
 * micro-operations. Operators are folded strictly left to right with no
 * precedence: every operand is loaded into a fresh register and every
 * operation writes a fresh register.
 */

import { Lexer, TokenType, isOperand, isOperator, type Token } from './lexer.js';
import { RegisterAllocator } from './registers.js';
import { binary, formatInstruction, move, type Instruction } from './instructions.js';
import { TranslationErrorKind, TranslatorError, type TranslationError } from './errors.js';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface TranslationSuccess {
  ok: true;
  variable: string;
  tokens: Token[];
  instructions: string[];
  operations: Instruction[];
  error: null;
}

export interface TranslationFailure {
  ok: false;
  variable: string | null;
  /** Scanned right-hand side; null when scanning was never reached */
  tokens: Token[] | null;
  instructions: string[];
  operations: Instruction[];
  error: TranslationError;
}

export type TranslationResult = TranslationSuccess | TranslationFailure;

export class Translator {
  private expression: string;
  private registers = new RegisterAllocator();
  private operations: Instruction[] = [];
  private variable: string | null = null;
  private tokens: Token[] | null = null;

  constructor(expression: string) {
    this.expression = expression;
  }

  translate(): TranslationResult {
    this.registers = new RegisterAllocator();
    this.operations = [];
    this.variable = null;
    this.tokens = null;

    try {
      const [variable, expr] = this.splitAssignment();
      this.variable = variable;
      const tokens = new Lexer(expr).tokenize();
      this.tokens = tokens;
      this.emit(variable, tokens);

      return {
        ok: true,
        variable,
        tokens,
        instructions: this.operations.map(formatInstruction),
        operations: this.operations,
        error: null,
      };
    } catch (e: unknown) {
      return this.fail(e);
    }
  }

  private splitAssignment(): [string, string] {
    const parts = this.expression.split('=');
    if (parts.length === 1) {
      throw new TranslatorError('Expression must contain an assignment (=)', TranslationErrorKind.MissingAssignment);
    }
    if (parts.length !== 2) {
      throw new TranslatorError('Invalid assignment format', TranslationErrorKind.MissingAssignment);
    }

    const variable = parts[0].trim();
    if (!VARIABLE_NAME.test(variable)) {
      throw new TranslatorError('Invalid variable name', TranslationErrorKind.InvalidVariableName);
    }

    return [variable, parts[1].trim()];
  }

  private emit(variable: string, tokens: Token[]): void {
    if (tokens.length === 0) {
      throw new TranslatorError('Empty expression', TranslationErrorKind.EmptyExpression);
    }

    if (tokens.length === 1) {
      if (!isOperand(tokens[0])) {
        throw new TranslatorError('Invalid single token', TranslationErrorKind.InvalidSingleToken);
      }
      this.operations.push(move(variable, tokens[0].value));
      return;
    }

    let accumulator = this.load(this.expectOperand(tokens[0]));

    for (let i = 1; i < tokens.length; i += 2) {
      const operator = tokens[i];
      if (operator.type !== TokenType.OPERATOR || !isOperator(operator.value)) {
        throw new TranslatorError(
          `Expected operator at position ${i}`,
          TranslationErrorKind.UnexpectedToken,
          i,
        );
      }
      if (i + 1 >= tokens.length) {
        throw new TranslatorError('Missing operand after operator', TranslationErrorKind.MissingOperand);
      }

      const operand = this.load(this.expectOperand(tokens[i + 1]));
      const result = this.registers.allocate();
      this.operations.push(binary(result, accumulator, operator.value, operand));
      accumulator = result;
    }

    this.operations.push(move(variable, accumulator));
  }

  private expectOperand(token: Token): Token {
    if (!isOperand(token)) {
      throw new TranslatorError(
        `Expected number or variable at position ${token.position}`,
        TranslationErrorKind.UnexpectedToken,
        token.position,
      );
    }
    return token;
  }

  // Loads an operand into a fresh register and returns the register
  private load(token: Token): string {
    const register = this.registers.allocate();
    this.operations.push(move(register, token.value));
    return register;
  }

  private fail(e: unknown): TranslationFailure {
    const error: TranslationError = e instanceof TranslatorError
      ? e.toTranslationError()
      : { kind: TranslationErrorKind.InternalError, message: e instanceof Error ? e.message : String(e) };

    return {
      ok: false,
      variable: this.variable,
      tokens: this.tokens,
      instructions: [],
      operations: [],
      error,
    };
  }
}

export function translate(expression: string): TranslationResult {
  return new Translator(expression).translate();
}
