/**
 * @fileoverview Text normalization shared by the sparse index, the
 * expander and the support checker. All three must tokenize identically or
 * lexical scores stop lining up.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const STOPWORDS_URL = new URL('../../data/stopwords.json', import.meta.url);

let stopwords: ReadonlySet<string> | null = null;

export function getStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const raw: unknown = JSON.parse(readFileSync(STOPWORDS_URL, 'utf8'));
    stopwords = new Set(z.array(z.string()).parse(raw));
  }
  return stopwords;
}

/** Lowercases and keeps letters and digits of any script. */
export function normalizeText(value: string): string {
  return value
    .normalize('NFC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** All normalized tokens, stopwords included. */
export function tokenize(value: string): string[] {
  const normalized = normalizeText(value);
  if (!normalized) return [];
  return normalized.split(' ');
}

/** Normalized tokens with stopwords removed. */
export function contentTokens(value: string): string[] {
  const stop = getStopwords();
  return tokenize(value).filter((token) => !stop.has(token));
}

export function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}

export function isNumericToken(token: string): boolean {
  return /^\d+$/.test(token);
}

export function estimateTokenCount(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 1;
  return Math.max(1, Math.ceil(trimmed.length / 4));
}
