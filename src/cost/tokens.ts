/**
 * Token counting utilities using tiktoken.
 * Counts chat prompts and completion text for cost estimation.
 * Falls back to character-based estimation if tiktoken is unavailable.
 */

import { createRequire } from 'node:module';
import type { Tiktoken, TiktokenEncoding } from 'tiktoken';
import { pricingLogger } from '../utils/logger.js';

/** Overhead tokens added per message in the chat format */
const PER_MESSAGE_OVERHEAD = 3;

/** Tokens added at the end for reply priming */
const REPLY_PRIMING_TOKENS = 3;

/** Rough character-to-token ratio used when tiktoken is unavailable */
const CHARS_PER_TOKEN_FALLBACK = 4;

const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

/** Model families tokenized with o200k_base */
const O200K_PREFIXES = ['gpt-4o', 'gpt-4.1', 'gpt-4.5', 'chatgpt-4o', 'o1', 'o3', 'o4'];

/** The minimal message shape needed for counting */
export interface CountableMessage {
  role: string;
  content: string;
  name?: string;
}

/** Anything that can count tokens for a model */
export interface Tokenizer {
  countTokens(text: string, model: string): number;
}

type TiktokenModule = typeof import('tiktoken');

let tiktokenModule: TiktokenModule | undefined;
let useFallback = false;
const encoders = new Map<TiktokenEncoding, Tiktoken>();

/**
 * Pick the tiktoken encoding for a model identifier.
 * Unknown models use cl100k_base.
 */
export function encodingForModel(model: string): TiktokenEncoding {
  return O200K_PREFIXES.some((prefix) => model.startsWith(prefix)) ? 'o200k_base' : DEFAULT_ENCODING;
}

function loadEncoding(encodingName: TiktokenEncoding): Tiktoken {
  if (!tiktokenModule) {
    // createRequire keeps loading synchronous in ESM; the WASM module may
    // fail to load in some environments.
    const esmRequire = createRequire(import.meta.url);
    tiktokenModule = esmRequire('tiktoken') as TiktokenModule;
  }
  const encoder = tiktokenModule.get_encoding(encodingName);
  encoders.set(encodingName, encoder);
  return encoder;
}

/**
 * Get the encoder for an encoding, loading it on first use.
 * An encoding that fails to load is served by cl100k_base from then on.
 * Returns undefined once tiktoken has proven unusable.
 */
function getEncoder(encodingName: TiktokenEncoding): Tiktoken | undefined {
  if (useFallback) {
    return undefined;
  }

  const cached = encoders.get(encodingName);
  if (cached) {
    return cached;
  }

  try {
    return loadEncoding(encodingName);
  } catch (initError: unknown) {
    const errorMessage = initError instanceof Error ? initError.message : String(initError);
    if (encodingName !== DEFAULT_ENCODING) {
      pricingLogger.warn({ encoding: encodingName, error: errorMessage }, 'Encoding failed to load, using cl100k_base');
      const substitute = getEncoder(DEFAULT_ENCODING);
      if (substitute) {
        encoders.set(encodingName, substitute);
      }
      return substitute;
    }
    pricingLogger.warn(
      { error: errorMessage },
      'tiktoken failed to initialize, falling back to character-based token estimation',
    );
    useFallback = true;
    return undefined;
  }
}

/**
 * Count tokens in a text string with the encoding used by the model.
 * Never fails: falls back to chars/4 estimation.
 */
export function countTokens(text: string, model: string): number {
  if (text.length === 0) {
    return 0;
  }

  const enc = getEncoder(encodingForModel(model));
  if (enc) {
    try {
      // Special-token markup in user text is encoded as ordinary text.
      return enc.encode(text, [], []).length;
    } catch (encodeError: unknown) {
      const errorMessage = encodeError instanceof Error ? encodeError.message : String(encodeError);
      pricingLogger.warn({ model, error: errorMessage }, 'Token encoding failed, using estimate');
    }
  }

  return Math.ceil(text.length / CHARS_PER_TOKEN_FALLBACK);
}

/** Default tokenizer backed by tiktoken */
export const tiktokenTokenizer: Tokenizer = { countTokens };

/**
 * Estimate prompt tokens for a list of chat messages.
 * Each message contributes the tokens of role, name and content concatenated
 * plus a fixed overhead, and the reply is primed with a fixed count.
 */
export function countMessageTokens(
  messages: readonly CountableMessage[],
  model: string,
  tokenizer: Tokenizer = tiktokenTokenizer,
): number {
  let total = 0;
  for (const message of messages) {
    total += tokenizer.countTokens(message.role + (message.name ?? '') + message.content, model);
    total += PER_MESSAGE_OVERHEAD;
  }
  return total + REPLY_PRIMING_TOKENS;
}

/** The part of a completion choice that carries text */
export interface CountableChoice {
  message?: { content?: string | null } | null;
}

/**
 * Count completion tokens from the concatenated text of all choices.
 */
export function countCompletionTokens(
  choices: readonly CountableChoice[],
  model: string,
  tokenizer: Tokenizer = tiktokenTokenizer,
): number {
  const text = choices.map((choice) => choice.message?.content ?? '').join('');
  return tokenizer.countTokens(text, model);
}
