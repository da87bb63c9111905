/**
 * @fileoverview Claim splitting for answer validation
 *
 * A claim is one sentence of the answer with its citation markers. Bullet
 * and numbering markers are ignored, markers written after the closing
 * punctuation stay with their sentence, and fragments with fewer than
 * `minClaimTokens` content tokens (headings, connectives) are skipped.
 */

import { extractCitationIndices, stripCitationMarkers } from '../generation/citations.js';
import { contentTokens } from '../utils/text.js';

export interface ClaimSpan {
  /** Sentence without citation markers */
  text: string;
  citedIndices: number[];
}

export interface ClaimSplit {
  claims: ClaimSpan[];
  skipped: string[];
}

const ABBREVIATIONS = new Set([
  'art', 'arts', 'sec', 'secs', 'no', 'nos', 'para', 'paras', 'cl', 'ch', 'vol',
  'v', 'vs', 'e.g', 'i.e', 'cf', 'etc', 'u.s', 'st', 'mr', 'mrs', 'dr', 'prof', 'jr', 'sr',
]);

const TRAILING_MARKERS = /([.!?])((?:\s*\[(?:source\s+)?\d+(?:\s*,\s*(?:source\s+)?\d+)*\])+)/gi;
const BULLET = /^\s*(?:[-*•]|\d+[.)]|[a-z][.)])\s+/i;

function endsWithAbbreviation(fragment: string): boolean {
  const match = fragment.match(/(\S+)\.$/);
  if (!match) return false;
  const word = match[1].toLowerCase().replace(/^[("'[]+/, '');
  return ABBREVIATIONS.has(word) || /^[a-z]$/.test(word);
}

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  const lines = text
    .replace(TRAILING_MARKERS, '$2$1')
    .split(/\n+/)
    .map((line) => line.replace(BULLET, '').trim())
    .filter(Boolean);

  for (const line of lines) {
    let pending = '';
    for (const fragment of line.split(/(?<=[.!?])\s+/)) {
      pending = pending ? `${pending} ${fragment}` : fragment;
      if (!endsWithAbbreviation(pending)) {
        sentences.push(pending.trim());
        pending = '';
      }
    }
    if (pending.trim()) sentences.push(pending.trim());
  }
  return sentences;
}

export function splitClaims(answer: string, minClaimTokens: number): ClaimSplit {
  const claims: ClaimSpan[] = [];
  const skipped: string[] = [];
  for (const sentence of splitSentences(answer)) {
    const text = stripCitationMarkers(sentence);
    if (contentTokens(text).length < minClaimTokens) {
      if (text) skipped.push(text);
      continue;
    }
    const citedIndices = Array.from(new Set(extractCitationIndices(sentence)));
    claims.push({ text, citedIndices });
  }
  return { claims, skipped };
}
