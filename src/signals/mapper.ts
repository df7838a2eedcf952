/**
 * Signal Mapping — turning words into a number the core can feel
 *
 * The core only accepts numeric signals. Anything richer (chat text,
 * sensor readings, sentiment scores) is reduced to a single number by
 * a SignalMapper before it reaches the input channel.
 */

import fs from 'fs';
import path from 'path';

export interface SignalMapper {
  map(text: string): number;
}

export interface Lexicon {
  positive: string[];
  negative: string[];
  positiveSignal: number;
  negativeSignal: number;
  neutralSignal: number;
}

const DEFAULT_LEXICON_PATH = path.join(process.cwd(), 'data', 'lexicon.json');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validate parsed JSON as a lexicon.
 * @throws {Error} naming the first malformed field
 */
export function parseLexicon(raw: unknown): Lexicon {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('Lexicon must be a JSON object');
  }
  const { positive, negative, positiveSignal, negativeSignal, neutralSignal }: Record<string, unknown> = { ...raw };

  if (!isStringArray(positive)) throw new Error('Lexicon field "positive" must be an array of strings');
  if (!isStringArray(negative)) throw new Error('Lexicon field "negative" must be an array of strings');
  if (!isFiniteNumber(positiveSignal)) throw new Error('Lexicon field "positiveSignal" must be a finite number');
  if (!isFiniteNumber(negativeSignal)) throw new Error('Lexicon field "negativeSignal" must be a finite number');
  if (!isFiniteNumber(neutralSignal)) throw new Error('Lexicon field "neutralSignal" must be a finite number');

  return { positive, negative, positiveSignal, negativeSignal, neutralSignal };
}

export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
  return parseLexicon(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

/**
 * Keyword sentiment: negative words push the signal down, positive
 * words lift it. A negative hit wins over a positive one; unmatched
 * text maps to the neutral signal.
 */
export class KeywordSignalMapper implements SignalMapper {
  private positive: Set<string>;
  private negative: Set<string>;

  constructor(private readonly lexicon: Lexicon = loadLexicon()) {
    this.positive = new Set(lexicon.positive.map(w => w.toLowerCase()));
    this.negative = new Set(lexicon.negative.map(w => w.toLowerCase()));
  }

  map(text: string): number {
    const words = text.toLowerCase().split(/[^\p{L}\p{N}']+/u).filter(w => w.length > 0);

    const hasNegative = words.some(w => this.negative.has(w));
    const hasPositive = words.some(w => this.positive.has(w));

    if (hasNegative) return this.lexicon.negativeSignal;
    if (hasPositive) return this.lexicon.positiveSignal;
    return this.lexicon.neutralSignal;
  }
}
