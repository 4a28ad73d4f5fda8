import { describe, it, expect, vi, afterEach } from 'vitest';
import { Translator, translate } from '../../src/translator/translator.js';
import { TranslationErrorKind } from '../../src/translator/errors.js';
import { Lexer } from '../../src/translator/lexer.js';

function errorOf(expression: string) {
  const result = translate(expression);
  expect(result.ok).toBe(false);
  expect(result.instructions).toEqual([]);
  return result.error;
}

describe('translate', () => {
  describe('successful translation', () => {
    it('should translate a single addition', () => {
      const result = translate('x = 6 + 9');
      expect(result.ok).toBe(true);
      expect(result.error).toBeNull();
      expect(result.instructions).toEqual(['R1 <- 6', 'R2 <- 9', 'R3 <- R1 + R2', 'x <- R3']);
    });

    it('should fold several operators left to right', () => {
      const result = translate('result = a + b - 3');
      expect(result.instructions).toEqual([
        'R1 <- a',
        'R2 <- b',
        'R3 <- R1 + R2',
        'R4 <- 3',
        'R5 <- R3 - R4',
        'result <- R5',
      ]);
    });

    it('should ignore operator precedence', () => {
      const result = translate('y = 3 + 2 * 4');
      expect(result.instructions).toEqual([
        'R1 <- 3',
        'R2 <- 2',
        'R3 <- R1 + R2',
        'R4 <- 4',
        'R5 <- R3 * R4',
        'y <- R5',
      ]);
    });

    it('should assign a single number directly', () => {
      expect(translate('x = 5').instructions).toEqual(['x <- 5']);
    });

    it('should assign a single variable directly', () => {
      expect(translate('x = y').instructions).toEqual(['x <- y']);
    });

    it('should accept expressions without spaces', () => {
      expect(translate('z=a/b').instructions).toEqual(['R1 <- a', 'R2 <- b', 'R3 <- R1 / R2', 'z <- R3']);
    });

    it('should accept underscores and digits in the target variable', () => {
      const result = translate('  _total2  = 1 - 1');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.variable).toBe('_total2');
      }
      expect(result.instructions[3]).toBe('_total2 <- R3');
    });

    it('should expose structured operations alongside the text', () => {
      const result = translate('x = 6 + 9');
      expect(result.operations).toEqual([
        { kind: 'move', dest: 'R1', src: '6' },
        { kind: 'move', dest: 'R2', src: '9' },
        { kind: 'binary', dest: 'R3', left: 'R1', operator: '+', right: 'R2' },
        { kind: 'move', dest: 'x', src: 'R3' },
      ]);
    });

    it('should translate non-ASCII letters as variables', () => {
      expect(translate('x = é + 1').instructions).toEqual(['R1 <- é', 'R2 <- 1', 'R3 <- R1 + R2', 'x <- R3']);
      expect(translate('x = π').instructions).toEqual(['x <- π']);
    });

    it('should translate non-ASCII decimal digits as numbers', () => {
      expect(translate('x = ٣ + 1').instructions).toEqual(['R1 <- ٣', 'R2 <- 1', 'R3 <- R1 + R2', 'x <- R3']);
    });

    it('should keep the target variable ASCII-only', () => {
      expect(translate('é = 1').error?.kind).toBe(TranslationErrorKind.InvalidVariableName);
    });

    it('should expose the scanned tokens', () => {
      const result = translate('x = a*2');
      expect(result.tokens?.map(t => t.value)).toEqual(['a', '*', '2']);
    });

    it('should silently drop unrecognized characters', () => {
      expect(translate('x = (a) + b;').instructions).toEqual([
        'R1 <- a',
        'R2 <- b',
        'R3 <- R1 + R2',
        'x <- R3',
      ]);
    });
  });

  describe('assignment errors', () => {
    it('should reject an expression without =', () => {
      const error = errorOf('x + 5');
      expect(error?.kind).toBe(TranslationErrorKind.MissingAssignment);
      expect(error?.message).toBe('Expression must contain an assignment (=)');
    });

    it('should reject more than one =', () => {
      const error = errorOf('x = y = 5');
      expect(error?.kind).toBe(TranslationErrorKind.MissingAssignment);
      expect(error?.message).toBe('Invalid assignment format');
    });

    it('should reject a comparison written with ==', () => {
      expect(errorOf('x == 5')?.kind).toBe(TranslationErrorKind.MissingAssignment);
    });

    it('should reject an empty input', () => {
      expect(errorOf('')?.kind).toBe(TranslationErrorKind.MissingAssignment);
    });
  });

  describe('variable name errors', () => {
    it('should reject a variable starting with a digit', () => {
      const error = errorOf('3x = 5');
      expect(error?.kind).toBe(TranslationErrorKind.InvalidVariableName);
      expect(error?.message).toBe('Invalid variable name');
    });

    it('should reject an empty variable', () => {
      expect(errorOf(' = 5')?.kind).toBe(TranslationErrorKind.InvalidVariableName);
    });

    it('should reject a variable containing spaces', () => {
      expect(errorOf('my var = 5')?.kind).toBe(TranslationErrorKind.InvalidVariableName);
    });

    it('should check the variable before the expression', () => {
      expect(errorOf('1 = ')?.kind).toBe(TranslationErrorKind.InvalidVariableName);
    });
  });

  describe('expression errors', () => {
    it('should reject an empty right-hand side', () => {
      const error = errorOf('y = ');
      expect(error?.kind).toBe(TranslationErrorKind.EmptyExpression);
      expect(error?.message).toBe('Empty expression');
    });

    it('should reject a right-hand side of only dropped characters', () => {
      expect(errorOf('y = ()')?.kind).toBe(TranslationErrorKind.EmptyExpression);
    });

    it('should reject a single mixed alphanumeric token', () => {
      const error = errorOf('x = a1');
      expect(error?.kind).toBe(TranslationErrorKind.InvalidSingleToken);
      expect(error?.message).toBe('Invalid single token');
    });

    it('should reject a single operator', () => {
      expect(errorOf('x = +')?.kind).toBe(TranslationErrorKind.InvalidSingleToken);
    });

    it('should reject an expression starting with an operator', () => {
      const error = errorOf('x = + 3');
      expect(error).toEqual({
        kind: TranslationErrorKind.UnexpectedToken,
        message: 'Expected number or variable at position 0',
        position: 0,
      });
    });

    it('should reject two operands in a row', () => {
      const error = errorOf('x = 3x');
      expect(error).toEqual({
        kind: TranslationErrorKind.UnexpectedToken,
        message: 'Expected operator at position 1',
        position: 1,
      });
    });

    it('should reject two operators in a row', () => {
      const error = errorOf('x = 1 + - 2');
      expect(error).toEqual({
        kind: TranslationErrorKind.UnexpectedToken,
        message: 'Expected number or variable at position 2',
        position: 2,
      });
    });

    it('should reject a mixed alphanumeric operand', () => {
      const error = errorOf('x = a + b2');
      expect(error?.kind).toBe(TranslationErrorKind.UnexpectedToken);
      expect(error?.position).toBe(2);
    });

    it('should reject a trailing operator', () => {
      const error = errorOf('x = 1 + 2 *');
      expect(error).toEqual({
        kind: TranslationErrorKind.MissingOperand,
        message: 'Missing operand after operator',
      });
    });

    it('should keep the variable on failures after the split', () => {
      const result = translate('x = 1 +');
      expect(result.ok).toBe(false);
      expect(result.variable).toBe('x');
      expect(result.operations).toEqual([]);
    });

    it('should report no variable when the split fails', () => {
      expect(translate('x + 1').variable).toBeNull();
    });

    it('should report no tokens when the split fails', () => {
      expect(translate('x = 1 = 2').tokens).toBeNull();
    });

    it('should keep the tokens on failures after scanning', () => {
      expect(translate('x = 1 +').tokens?.map(t => t.value)).toEqual(['1', '+']);
    });
  });

  describe('internal errors', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should report unexpected failures instead of throwing', () => {
      vi.spyOn(Lexer.prototype, 'tokenize').mockImplementation(() => {
        throw new Error('scanner exploded');
      });

      const result = translate('x = 1 + 2');
      expect(result.ok).toBe(false);
      expect(result.instructions).toEqual([]);
      expect(result.error).toEqual({
        kind: TranslationErrorKind.InternalError,
        message: 'scanner exploded',
      });
    });
  });

  describe('properties', () => {
    const valid = [
      'x = 6 + 9',
      'result = a + b - 3',
      'x = 5',
      'p = 1 * 2 * 3 * 4 * 5',
      'q = a / b + c - d * e',
    ];

    it('should produce identical output on repeated calls', () => {
      for (const expression of valid) {
        expect(translate(expression)).toEqual(translate(expression));
      }
    });

    it('should reset registers on every call of a reused translator', () => {
      const translator = new Translator('x = 1 + 2');
      expect(translator.translate().instructions).toEqual(translator.translate().instructions);
    });

    it('should emit 2(n-1) + 2 instructions for n operands', () => {
      const result = translate('p = 1 * 2 * 3 * 4 * 5');
      expect(result.instructions).toHaveLength(2 * 4 + 2);
    });

    it('should number registers 1, 2, 3, ... without repeats', () => {
      const result = translate('q = a / b + c - d * e');
      const destinations = result.operations
        .map(op => op.dest)
        .filter(dest => /^R\d+$/.test(dest))
        .map(dest => Number(dest.slice(1)));
      expect(destinations).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('should always end by storing into the target variable', () => {
      for (const expression of valid) {
        const result = translate(expression);
        expect(result.ok).toBe(true);
        const last = result.operations[result.operations.length - 1];
        expect(last.dest).toBe(expression.split('=')[0].trim());
      }
    });
  });
});
