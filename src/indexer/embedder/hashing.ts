/**
 * Feature-Hashing Embedding Provider
 *
 * A local, dependency-free embedding: lower-cased word unigrams and bigrams
 * (minus stopwords) are hashed with 32-bit FNV-1a into a fixed number of
 * buckets with a hash-derived sign, weighted by 1 + ln(tf), then
 * L2-normalized. Cosine similarity between two vectors is then a dot
 * product that rewards shared terms and shared phrases.
 *
 * Output depends only on the input text and the dimension count.
 */

import { readFileSync } from 'node:fs';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_HASHING_DIMENSIONS = 384;
export const HASHING_MODEL = 'feature-hash-v1';

/** Bigrams carry half the weight of single words */
const BIGRAM_WEIGHT = 0.5;

const STOPWORDS_URL = new URL('../../../data/stopwords.json', import.meta.url);

let stopwords: ReadonlySet<string> | null = null;

function loadStopwords(): ReadonlySet<string> {
  if (stopwords === null) {
    const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_URL, 'utf-8'));
    stopwords = new Set(Array.isArray(parsed) ? parsed.filter((w): w is string => typeof w === 'string') : []);
  }
  return stopwords;
}

/**
 * 32-bit FNV-1a over UTF-16 code units.
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Lower-case word tokens with stopwords removed. Keeps "10-k", "r&d",
 * "3.5" and "company's" as single tokens.
 */
export function tokenize(text: string): string[] {
  const matches = text.toLowerCase().match(/[a-z0-9]+(?:['&.\-][a-z0-9]+)*/g) ?? [];
  const skip = loadStopwords();
  return matches.filter((token) => !skip.has(token));
}

/**
 * Compute one hashed, normalized vector.
 */
export function hashEmbed(text: string, dimensions: number = DEFAULT_HASHING_DIMENSIONS): Float32Array {
  const weights = new Map<string, number>();
  const tokens = tokenize(text);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;
    weights.set(token, (weights.get(token) ?? 0) + 1);
    const next = tokens[i + 1];
    if (next !== undefined) {
      const bigram = `${token} ${next}`;
      weights.set(bigram, (weights.get(bigram) ?? 0) + BIGRAM_WEIGHT);
    }
  }

  const values = new Float64Array(dimensions);
  for (const [feature, tf] of weights) {
    const hash = fnv1a(feature);
    const bucket = hash % dimensions;
    const sign = (fnv1a(`${feature}#`) & 1) === 0 ? 1 : -1;
    values[bucket] = (values[bucket] ?? 0) + sign * (1 + Math.log(tf));
  }

  let norm = 0;
  for (const v of values) norm += v * v;
  norm = Math.sqrt(norm);

  const vector = new Float32Array(dimensions);
  if (norm > 0) {
    for (let i = 0; i < dimensions; i++) {
      vector[i] = (values[i] ?? 0) / norm;
    }
  }
  return vector;
}

/**
 * EmbeddingProvider backed by hashEmbed().
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly id: string;

  constructor(
    readonly dimensions: number = DEFAULT_HASHING_DIMENSIONS,
    readonly model: string = HASHING_MODEL
  ) {
    this.id = `hashing/${model}:${dimensions}`;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => hashEmbed(text, this.dimensions));
  }
}
