import { describe, it, expect, afterAll } from 'vitest';
import { get_encoding } from 'tiktoken';
import {
  countCompletionTokens,
  countMessageTokens,
  countTokens,
  encodingForModel,
} from '../../../src/cost/tokens.js';
import { charTokenizer } from '../../mocks/upstream.js';

describe('encodingForModel', () => {
  it('uses o200k_base for newer model families', () => {
    expect(encodingForModel('gpt-4o-mini')).toBe('o200k_base');
    expect(encodingForModel('gpt-4.1')).toBe('o200k_base');
    expect(encodingForModel('o3-2025-04-16')).toBe('o200k_base');
  });

  it('uses cl100k_base otherwise', () => {
    expect(encodingForModel('gpt-3.5-turbo')).toBe('cl100k_base');
    expect(encodingForModel('gpt-4-1106-preview')).toBe('cl100k_base');
    expect(encodingForModel('unknown')).toBe('cl100k_base');
  });
});

describe('countTokens', () => {
  it('returns 0 for empty text', () => {
    expect(countTokens('', 'gpt-4o')).toBe(0);
  });

  it('counts tokens with tiktoken', () => {
    expect(countTokens('hello world', 'gpt-3.5-turbo')).toBe(2);
    expect(countTokens('hello world', 'gpt-4o')).toBe(2);
  });

  describe('encoding per model family', () => {
    const text = 'Привет, как дела? Сегодня хорошая погода. こんにちは、今日はいい天気ですね。';
    const o200k = get_encoding('o200k_base');
    const cl100k = get_encoding('cl100k_base');

    afterAll(() => {
      o200k.free();
      cl100k.free();
    });

    it('keeps the o200k_base count after a cl100k_base model was counted', () => {
      const expectedO200k = o200k.encode(text, [], []).length;
      const expectedCl100k = cl100k.encode(text, [], []).length;
      expect(expectedO200k).not.toBe(expectedCl100k);

      expect(countTokens(text, 'gpt-3.5-turbo')).toBe(expectedCl100k);
      expect(countTokens(text, 'gpt-4o')).toBe(expectedO200k);
      expect(countTokens(text, 'gpt-3.5-turbo')).toBe(expectedCl100k);
    });
  });

  it('encodes special-token markup as plain text', () => {
    expect(countTokens('<|endoftext|>', 'gpt-3.5-turbo')).toBeGreaterThan(1);
  });
});

describe('countMessageTokens', () => {
  it('adds per-message overhead and reply priming', () => {
    const messages = [{ role: 'user', content: 'hi' }];
    // "userhi" = 6, +3 per message, +3 priming
    expect(countMessageTokens(messages, 'gpt-4o', charTokenizer)).toBe(12);
  });

  it('includes the participant name', () => {
    const messages = [
      { role: 'system', content: 'be brief' },
      { role: 'user', name: 'bob', content: 'hi' },
    ];
    // "systembe brief" = 14, "userbobhi" = 9, +3 +3, +3
    expect(countMessageTokens(messages, 'gpt-4o', charTokenizer)).toBe(32);
  });

  it('costs 3 tokens for an empty list', () => {
    expect(countMessageTokens([], 'gpt-4o', charTokenizer)).toBe(3);
  });

  it('uses tiktoken by default', () => {
    expect(countMessageTokens([{ role: 'user', content: 'hello world' }], 'gpt-3.5-turbo'))
      .toBe(countTokens('userhello world', 'gpt-3.5-turbo') + 6);
  });
});

describe('countCompletionTokens', () => {
  it('counts the concatenated text of every choice', () => {
    const choices = [
      { message: { content: 'abc' } },
      { message: { content: null } },
      { message: { content: 'de' } },
    ];
    expect(countCompletionTokens(choices, 'gpt-4o', charTokenizer)).toBe(5);
  });

  it('returns 0 when there are no choices', () => {
    expect(countCompletionTokens([], 'gpt-4o', charTokenizer)).toBe(0);
  });
});
