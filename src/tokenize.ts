// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shell-style tokenizer for input lines.
 *
 * - Whitespace separates tokens
 * - '...' keeps its content literally
 * - "..." keeps its content; \" and \\ are unescaped inside
 * - Outside quotes a backslash escapes the next character
 * - Quoted and unquoted parts that touch form one token ("a"b -> ab)
 */

import { TokenizeError } from './errors.js';

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;
  let quoteStart = -1;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && (input[i + 1] === '"' || input[i + 1] === '\\')) {
        current += input[i + 1];
        i++;
      } else {
        current += char;
      }
      continue;
    }

    if (WHITESPACE.has(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    inToken = true;

    if (char === '"' || char === "'") {
      quote = char;
      quoteStart = i;
      continue;
    }

    if (char === '\\') {
      if (i + 1 >= input.length) {
        throw new TokenizeError('No escaped character after trailing backslash', i);
      }
      current += input[i + 1];
      i++;
      continue;
    }

    current += char;
  }

  if (quote) {
    throw new TokenizeError(`No closing quotation for ${quote} at position ${quoteStart}`, quoteStart);
  }

  if (inToken) tokens.push(current);
  return tokens;
}
