#!/usr/bin/env node

import readline from 'readline';

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m'
} as const;

// Symbols
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→'
} as const;

export type Color = keyof typeof colors;

/**
 * Print colored message to console
 */
export function print(message: string, color: Color = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

/**
 * Print a bold section heading, preceded by a blank line.
 */
export function printHeading(message: string): void {
  console.log(`\n${colors.bold}${message}${colors.reset}`);
}

/**
 * Print a framed banner. Every line is padded to the width of the longest one.
 */
export function printBanner(lines: string[], color: Color = 'cyan'): void {
  const width = Math.max(...lines.map((l) => l.length)) + 4;
  const horizontal = '═'.repeat(width);
  const body = lines.map((l) => `║  ${l.padEnd(width - 4)}  ║`);
  print(['', `╔${horizontal}╗`, ...body, `╚${horizontal}╝`, ''].join('\n'), color);
}

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Ask user for input (promise-based)
 * @param question - Question to ask
 * @returns User's answer, trimmed; '' when input ends before a line arrives
 */
export function askQuestion(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<string> {
  const rl = readline.createInterface(streams);

  return new Promise((resolve) => {
    let settled = false;
    const finish = (answer: string): void => {
      if (settled) return;
      settled = true;
      rl.close();
      resolve(answer.trim());
    };

    rl.once('close', () => finish(''));
    rl.question(question, finish);
  });
}
