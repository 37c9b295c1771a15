// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { tokenize } from '../src/tokenize.js';
import { TokenizeError } from '../src/errors.js';

describe('tokenize', () => {
  it('splits on whitespace', () => {
    expect(tokenize('agent-action conn act p1 p2')).toEqual(['agent-action', 'conn', 'act', 'p1', 'p2']);
  });

  it('collapses runs of whitespace, tabs and newlines', () => {
    expect(tokenize('  load-agent \t demo\n')).toEqual(['load-agent', 'demo']);
  });

  it('returns an empty list for blank input', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('   \t ')).toEqual([]);
  });

  it('keeps double-quoted text as one token', () => {
    expect(tokenize('agent-action conn post "hello world"')).toEqual(['agent-action', 'conn', 'post', 'hello world']);
  });

  it('keeps single-quoted text literally', () => {
    expect(tokenize("say 'a \\n \"b\"'")).toEqual(['say', 'a \\n "b"']);
  });

  it('unescapes quotes and backslashes inside double quotes', () => {
    expect(tokenize('say "she said \\"hi\\" \\\\ ok"')).toEqual(['say', 'she said "hi" \\ ok']);
  });

  it('leaves other backslashes inside double quotes alone', () => {
    expect(tokenize('say "a\\nb"')).toEqual(['say', 'a\\nb']);
  });

  it('escapes the next character outside quotes', () => {
    expect(tokenize('say hello\\ world')).toEqual(['say', 'hello world']);
  });

  it('joins adjacent quoted and unquoted parts', () => {
    expect(tokenize('pre"fix"\'ed\' x')).toEqual(['prefixed', 'x']);
  });

  it('produces an empty token for empty quotes', () => {
    expect(tokenize('cmd "" x')).toEqual(['cmd', '', 'x']);
  });

  it('rejects an unterminated double quote', () => {
    expect(() => tokenize('say "unterminated')).toThrow(TokenizeError);
    expect(() => tokenize('say "unterminated')).toThrow('No closing quotation for " at position 4');
  });

  it('rejects an unterminated single quote', () => {
    expect(() => tokenize("it's")).toThrow("No closing quotation for ' at position 2");
  });

  it('rejects a trailing backslash', () => {
    try {
      tokenize('abc\\');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TokenizeError);
      if (error instanceof TokenizeError) {
        expect(error.message).toBe('No escaped character after trailing backslash');
        expect(error.position).toBe(3);
        expect(error.code).toBe('TOKENIZE');
      }
    }
  });
});
