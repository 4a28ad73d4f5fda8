#!/usr/bin/env node
/**
 * RTL Translator CLI
 *
 * Usage: rtl-translate <expression> [-o output.txt] [--save] [--out-dir dir]
 *        rtl-translate -f expressions.txt [--save] [--out-dir dir]
 */

import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { listingFileName, listingText, formatListing, translate } from './translator/index.js';

interface CliOptions {
  expression: string;
  inputFile: string;
  outputFile: string;
  save: boolean;
  outDir: string;
  verbose: boolean;
}

const OPTIONS_WITH_VALUE = new Set(['-o', '--output', '-f', '--file', '-d', '--out-dir']);

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  const words: string[] = [];
  let inputFile = '';
  let outputFile = '';
  let save = false;
  let outDir = '.';
  let verbose = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (OPTIONS_WITH_VALUE.has(arg) && i + 1 >= cliArgs.length) {
      console.error(`Error: ${arg} requires a value`);
      return null;
    }

    if (arg === '-o' || arg === '--output') {
      outputFile = cliArgs[++i];
    } else if (arg === '-f' || arg === '--file') {
      inputFile = cliArgs[++i];
    } else if (arg === '-d' || arg === '--out-dir') {
      outDir = cliArgs[++i];
    } else if (arg === '--save') {
      save = true;
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (words.length > 0 || !arg.startsWith('-')) {
      // After the first expression word, non-options belong to the expression
      words.push(arg);
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  const expression = words.join(' ');

  if (!expression && !inputFile) {
    console.error('Error: No expression specified');
    return null;
  }

  if (expression && inputFile) {
    console.error('Error: Give either an expression or --file, not both');
    return null;
  }

  if (outputFile && inputFile) {
    console.error('Error: -o cannot be used with --file');
    return null;
  }

  return { expression, inputFile, outputFile, save, outDir, verbose };
}

function printUsage(): void {
  console.log(`RTL Translator

Usage: rtl-translate <expression> [-o output.txt] [--save] [--out-dir dir]
       rtl-translate -f <file> [--save] [--out-dir dir]

Options:
  -f, --file <file>     Translate each line of a file (# starts a comment line)
  -o, --output <file>   Write the numbered listing to a file
  --save                Save each listing as rtl_instructions_<variable>.txt
  -d, --out-dir <dir>   Directory used by --save (default: .)
  -v, --verbose         Print the token stream before translating
  -h, --help            Show this help message

Operators are evaluated strictly left to right, without precedence.

Examples:
  rtl-translate "x = 6 + 9"
  rtl-translate "result = a + b - 3" --save
  rtl-translate -f expressions.txt`);
}

function readExpressions(inputFile: string): string[] | null {
  let source: string;
  try {
    source = readFileSync(inputFile, 'utf-8');
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      console.error(`Error: File not found: ${inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${inputFile}`);
    }
    return null;
  }

  return source
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function writeListing(path: string, instructions: string[]): boolean {
  try {
    writeFileSync(path, listingText(instructions));
  } catch {
    console.error(`Error: Cannot write file: ${path}`);
    return false;
  }
  console.log(`Saved ${instructions.length} instructions to ${path}`);
  return true;
}

function run(expression: string, options: CliOptions): boolean {
  const result = translate(expression);

  if (options.verbose && result.tokens) {
    console.error(`tokens: ${result.tokens.map((t) => t.value).join(' ')}`);
  }

  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return false;
  }

  for (const line of formatListing(result.instructions)) {
    console.log(line);
  }

  if (options.outputFile && !writeListing(options.outputFile, result.instructions)) {
    return false;
  }

  if (options.save && !writeListing(join(options.outDir, listingFileName(result.variable)), result.instructions)) {
    return false;
  }

  return true;
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  if (!options.inputFile) {
    return run(options.expression, options) ? 0 : 1;
  }

  const expressions = readExpressions(options.inputFile);
  if (!expressions) {
    return 1;
  }

  let failed = 0;
  expressions.forEach((expression, i) => {
    if (i > 0) console.log('');
    console.log(expression);
    if (!run(expression, options)) failed++;
  });

  return failed === 0 ? 0 : 1;
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exit(main());
}
