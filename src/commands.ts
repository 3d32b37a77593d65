/**
 * CLI commands over header+body text files, without a document type:
 *   inspect   - Show headers and body size
 *   headers   - Print unfolded headers, one per line
 *   body      - Print the body
 *   reformat  - Rewrite a file with canonical folding
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { parseText, renderText } from './codec.js';

const VERSION = '0.1.0';

function printUsage(): void {
  console.log('textbase - header+body text documents\n');
  console.log('Usage:');
  console.log('  textbase inspect note.txt');
  console.log('  textbase headers note.txt');
  console.log('  textbase body note.txt');
  console.log('  textbase reformat note.txt -o tidy.txt');
  console.log();
  console.log("Run 'textbase <command> --help' for details on any command.");
  console.log("Run 'textbase --version' for version info.");
}

function getFlag(args: string[], flag: string, shortFlag?: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag || (shortFlag && args[i] === shortFlag)) {
      return args[i + 1];
    }
  }
  return undefined;
}

function hasFlag(args: string[], flag: string, shortFlag?: string): boolean {
  return args.includes(flag) || (shortFlag ? args.includes(shortFlag) : false);
}

function getPositional(args: string[]): string[] {
  const positional: string[] = [];
  const flags = new Set(['-o', '--output']);
  for (let i = 0; i < args.length; i++) {
    if (flags.has(args[i])) {
      i++; // skip value
      continue;
    }
    if (!args[i].startsWith('-')) {
      positional.push(args[i]);
    }
  }
  return positional;
}

/** First positional argument, or `null` after printing usage. */
function requirePath(args: string[], usage: string): string | null {
  const pos = getPositional(args);
  if (pos.length === 0) {
    console.error(`Usage: ${usage}`);
    return null;
  }
  return pos[0];
}

function cmdInspect(args: string[]): number {
  const usage = 'textbase inspect <path>';
  if (hasFlag(args, '--help', '-h')) {
    console.log(`Usage: ${usage}`);
    return 0;
  }
  const path = requirePath(args, usage);
  if (path === null) return 1;
  const { headers, body } = parseText(readFileSync(path, 'utf-8'));

  console.log('HEADERS:');
  for (const { name, value } of headers) {
    const display = value.length <= 60 ? value : value.slice(0, 57) + '...';
    console.log(`  ${name.padEnd(16)}  ${display}`);
  }
  console.log();
  console.log(`BODY: ${Buffer.byteLength(body, 'utf-8')} bytes`);
  return 0;
}

function cmdHeaders(args: string[]): number {
  const usage = 'textbase headers <path>';
  if (hasFlag(args, '--help', '-h')) {
    console.log(`Usage: ${usage}`);
    return 0;
  }
  const path = requirePath(args, usage);
  if (path === null) return 1;
  for (const { name, value } of parseText(readFileSync(path, 'utf-8')).headers) {
    console.log(`${name}: ${value}`);
  }
  return 0;
}

function cmdBody(args: string[]): number {
  const usage = 'textbase body <path>';
  if (hasFlag(args, '--help', '-h')) {
    console.log(`Usage: ${usage}`);
    return 0;
  }
  const path = requirePath(args, usage);
  if (path === null) return 1;
  process.stdout.write(parseText(readFileSync(path, 'utf-8')).body);
  return 0;
}

function cmdReformat(args: string[]): number {
  const usage = 'textbase reformat <path> [-o output]';
  if (hasFlag(args, '--help', '-h')) {
    console.log(`Usage: ${usage}`);
    console.log();
    console.log('Fold headers at 72 columns and separate the body with one blank line.');
    console.log('Rewrites the file in place unless -o is given.');
    return 0;
  }
  const path = requirePath(args, usage);
  if (path === null) return 1;
  const output = getFlag(args, '--output', '-o') || path;
  const { headers, body } = parseText(readFileSync(path, 'utf-8'));
  const text = renderText(headers, body);
  writeFileSync(output, text, 'utf-8');
  console.log(`Reformatted ${path} -> ${output} (${headers.length} headers)`);
  return 0;
}

/**
 * Run one CLI invocation. Output goes to the console; errors from the codec
 * or the file system propagate.
 *
 * @returns The process exit status.
 */
export function run(args: string[]): number {
  if (args.length === 0) {
    printUsage();
    return 0;
  }

  // Top-level flags
  if (args[0] === '--version' || args[0] === '-v' || args[0] === '-V') {
    console.log(`textbase ${VERSION}`);
    return 0;
  }
  if (args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'inspect':
      return cmdInspect(rest);
    case 'headers':
      return cmdHeaders(rest);
    case 'body':
      return cmdBody(rest);
    case 'reformat':
      return cmdReformat(rest);
    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'textbase --help' for usage.");
      return 1;
  }
}
