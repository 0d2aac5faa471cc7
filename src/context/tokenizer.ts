/**
 * Tokenizers
 *
 * The default tokenizer is gpt-tokenizer's BPE encoder. Any encode/decode
 * pair satisfying `Tokenizer` can be passed to the assembler instead.
 */

import { decode, encode } from "gpt-tokenizer";
import { TokenizationError } from "../utils/errors.js";
import type { Tokenizer } from "./types.js";

export const gptTokenizer: Tokenizer = {
  encode: (text) => encode(text),
  decode: (tokens) => decode(tokens),
};

/**
 * Encode, surfacing any tokenizer failure as TokenizationError
 */
export function encodeText(tokenizer: Tokenizer, text: string): readonly number[] {
  try {
    return tokenizer.encode(text);
  } catch (error) {
    throw new TokenizationError("tokenizer failed to encode text", "encode", { cause: error });
  }
}

/**
 * Decode, surfacing any tokenizer failure as TokenizationError
 */
export function decodeTokens(tokenizer: Tokenizer, tokens: readonly number[]): string {
  try {
    return tokenizer.decode(tokens);
  } catch (error) {
    throw new TokenizationError("tokenizer failed to decode tokens", "decode", { cause: error });
  }
}

export function countTokens(tokenizer: Tokenizer, text: string): number {
  return encodeText(tokenizer, text).length;
}
