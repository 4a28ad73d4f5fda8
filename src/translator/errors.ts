export enum TranslationErrorKind {
  MissingAssignment = 'MissingAssignment',
  InvalidVariableName = 'InvalidVariableName',
  EmptyExpression = 'EmptyExpression',
  InvalidSingleToken = 'InvalidSingleToken',
  UnexpectedToken = 'UnexpectedToken',
  MissingOperand = 'MissingOperand',
  InternalError = 'InternalError',
}

export interface TranslationError {
  kind: TranslationErrorKind;
  message: string;
  position?: number;
}

export class TranslatorError extends Error {
  constructor(message: string, public kind: TranslationErrorKind, public position?: number) {
    super(message);
    this.name = 'TranslatorError';
  }

  toTranslationError(): TranslationError {
    if (this.position === undefined) {
      return { kind: this.kind, message: this.message };
    }
    return { kind: this.kind, message: this.message, position: this.position };
  }
}
