// api/_lib/services/sentimentScorer.ts
/* ============================================================================
  Lexical compound sentiment
  - valence lexicon, boosters/dampeners and negations come from data/sentiment_lexicon.json
  - negation and booster scope is the 3 preceding words of the same clause
  - contrastive "but" halves what came before and amplifies what follows
  - compound = sum / sqrt(sum^2 + alpha), clamped to [-1, 1]
============================================================================ */

import type { SentimentLabel } from '../types/riskTypes';
import type { SentimentLexicon } from './riskConfig';

const ALPHA = 15;
const CAPS_INCREMENT = 0.733;
const NEGATION_SCALAR = -0.74;
const SCOPE = 3;
// Booster weight falls off with distance from the word it modifies
const DISTANCE_DAMPING = [1, 1, 0.95, 0.9];
const BEFORE_BUT = 0.5;
const AFTER_BUT = 1.5;
const EXCLAMATION_STEP = 0.292;
const MAX_EXCLAMATIONS = 4;
const QUESTION_STEP = 0.18;
const MAX_QUESTION_AMP = 0.96;

const CLAUSE_END = /[,;:.!?]$/;
const EDGE_PUNCT = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

interface Word {
  raw: string;
  lower: string;
  clause: number;
}

export interface SentimentBands {
  positiveAbove: number;
  negativeBelow: number;
}

function splitWords(text: string): Word[] {
  const words: Word[] = [];
  let clause = 0;
  for (const token of text.normalize('NFKC').replace(/[‘’ʼ]/g, "'").split(/\s+/)) {
    if (!token) continue;
    const raw = token.replace(EDGE_PUNCT, '');
    if (raw) words.push({ raw, lower: raw.toLowerCase(), clause });
    if (CLAUSE_END.test(token)) clause++;
  }
  return words;
}

function isShouting(raw: string): boolean {
  return /\p{L}/u.test(raw) && raw === raw.toUpperCase() && raw !== raw.toLowerCase();
}

function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}

export function normalizeCompound(sum: number): number {
  const compound = sum / Math.sqrt(sum * sum + ALPHA);
  return Math.max(-1, Math.min(1, compound));
}

export function classifySentiment(score: number, bands: SentimentBands): SentimentLabel {
  if (score > bands.positiveAbove) return 'positive';
  if (score < bands.negativeBelow) return 'negative';
  return 'neutral';
}

export class SentimentScorer {
  constructor(
    private readonly lexicon: SentimentLexicon,
    private readonly bands: SentimentBands,
  ) {}

  /** Compound polarity in [-1, 1]; blank text is 0. */
  score(text: string): number {
    if (!text.trim()) return 0;

    const words = splitWords(text);
    if (words.length === 0) return 0;

    const shoutingCount = words.filter(w => isShouting(w.raw) && w.raw.length > 1).length;
    const capsDifferential = shoutingCount > 0 && shoutingCount < words.length;
    const butIndex = words.findIndex(w => w.lower === 'but');

    let sum = 0;
    words.forEach((word, i) => {
      if (this.lexicon.boosters.has(word.lower)) return;
      const base = this.lexicon.valences.get(word.lower);
      if (base === undefined || base === 0) return;

      const direction = Math.sign(base);
      let valence = base;
      if (capsDifferential && isShouting(word.raw)) valence += direction * CAPS_INCREMENT;

      let negated = false;
      for (let distance = 1; distance <= SCOPE; distance++) {
        const prev = words[i - distance];
        if (!prev || prev.clause !== word.clause) break;
        const boost = this.lexicon.boosters.get(prev.lower);
        if (boost !== undefined) valence += direction * boost * DISTANCE_DAMPING[distance];
        if (this.lexicon.negations.has(prev.lower)) negated = true;
      }
      if (negated) valence *= NEGATION_SCALAR;

      if (butIndex >= 0) {
        if (i < butIndex) valence *= BEFORE_BUT;
        else if (i > butIndex) valence *= AFTER_BUT;
      }

      sum += valence;
    });

    if (sum !== 0) {
      const exclamations = Math.min((text.match(/!/g) ?? []).length, MAX_EXCLAMATIONS);
      const questions = (text.match(/\?/g) ?? []).length;
      const questionAmp = questions > 1 ? Math.min(questions * QUESTION_STEP, MAX_QUESTION_AMP) : 0;
      sum += Math.sign(sum) * (exclamations * EXCLAMATION_STEP + questionAmp);
    }

    return round4(normalizeCompound(sum));
  }

  classify(score: number): SentimentLabel {
    return classifySentiment(score, this.bands);
  }
}
