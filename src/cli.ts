#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { toPrintable } from './parser/printable';
import { Interpreter } from './runtime/interpreter';
import { Environment } from './runtime/environment';
import { ImpConfig, loadConfig, loadConfigForScript } from './runtime/config';
import { ImpError } from './errors';

const USAGE = `
imp - IMP language parser and interpreter v0.1.0

Usage:
  imp <file.imp>              Run an IMP program and print the final variables
  imp --parse <file.imp>      Parse and print AST
  imp --lex <file.imp>        Tokenize and print tokens
  imp --help                  Show this help message

Options:
  --trace                     Enable execution tracing
  --max-steps <n>             Abort after n executed statements
  --config <path>             Path to imp.config.json (auto-detected by default)

Examples:
  imp examples/factorial.imp
  imp --parse examples/factorial.imp
  imp --trace --max-steps 1000 examples/factorial.imp
`;

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run the CLI with the given arguments. Returns the process exit code.
 */
export function run(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  // Files are args that don't start with -- and aren't values for flags
  const flagsWithValues = new Set(['--config', '--max-steps']);
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (flagsWithValues.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    console.error('Error: No input file specified.');
    console.log(USAGE);
    return 1;
  }

  const filePath = path.resolve(files[0]);

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const source = fs.readFileSync(filePath, 'utf-8');

  // Lex-only mode
  if (flags.has('--lex')) {
    try {
      const tokens = new Lexer(source).tokenize();
      for (const tok of tokens) {
        console.log(`${tok.line}:${tok.column}\t${tok.tag} ${JSON.stringify(tok.text)}`);
      }
    } catch (e) {
      console.error(`Error: ${errorMessage(e)}`);
      return 1;
    }
    return 0;
  }

  // Parse-only mode
  if (flags.has('--parse')) {
    try {
      const tokens = new Lexer(source).tokenize();
      const ast = new Parser().parse(tokens);
      console.log(JSON.stringify(toPrintable(ast), null, 2));
    } catch (e) {
      console.error(`Error: ${errorMessage(e)}`);
      return 1;
    }
    return 0;
  }

  try {
    const configPath = getArg(args, '--config');
    const config: ImpConfig = configPath ? loadConfig(configPath) : loadConfigForScript(filePath);
    const traceEnabled = flags.has('--trace') || (config.trace ?? false);
    const maxStepsArg = getArg(args, '--max-steps');
    const maxSteps = maxStepsArg !== undefined ? parseMaxSteps(maxStepsArg) : config.maxSteps;

    if (traceEnabled && configPath) {
      console.log(`  [config] Loaded ${path.resolve(configPath)}`);
    }

    const tokens = new Lexer(source).tokenize();
    const ast = new Parser().parse(tokens);
    const interpreter = new Interpreter({ trace: traceEnabled, maxSteps });
    const env = interpreter.run(ast, new Environment(config.variables));

    console.log('Final variable values:');
    for (const [name, value] of env.entries()) {
      console.log(`${name}: ${value}`);
    }
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    if (flags.has('--trace') && e instanceof Error && e.stack) {
      console.error(e.stack);
    }
    return 1;
  }
  return 0;
}

function parseMaxSteps(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ImpError('UsageError', `Invalid --max-steps value "${value}": must be a positive integer`);
  }
  return n;
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
