/**
 * RTL Translator
 *
 * Translates single assignments into register transfer micro-operations.
 */

export * from './lexer.js';
export * from './registers.js';
export * from './instructions.js';
export * from './errors.js';
export * from './translator.js';
export * from './listing.js';
