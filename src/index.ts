// RTL Translator - assignment expressions to register transfer operations

export {
  translate,
  Translator,
  type TranslationResult,
  type TranslationSuccess,
  type TranslationFailure,
} from './translator/translator.js';

export { Lexer, TokenType, isOperand, isOperator, type Token, type Operator } from './translator/lexer.js';
export { RegisterAllocator } from './translator/registers.js';
export {
  formatInstruction,
  move,
  binary,
  type Instruction,
  type MoveInstruction,
  type BinaryInstruction,
} from './translator/instructions.js';
export { TranslatorError, TranslationErrorKind, type TranslationError } from './translator/errors.js';
export { formatListing, listingText, listingFileName } from './translator/listing.js';
