import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { SentimentLabel, SentimentTally } from "./types.js";

export const POSITIVE_THRESHOLD = 0.2;
export const NEGATIVE_THRESHOLD = -0.2;

const NEGATION_FACTOR = -0.5;

export interface PolarityScorer {
  /** Polarity in [-1, 1]. */
  score(text: string): number;
}

const LexiconSchema = z.object({
  polarity: z.record(z.number().min(-1).max(1)),
  intensifiers: z.record(z.number().positive()),
  negators: z.array(z.string()),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

const DEFAULT_LEXICON_PATH = fileURLToPath(new URL("../../data/sentiment-lexicon.json", import.meta.url));

export function loadLexicon(path: string = DEFAULT_LEXICON_PATH): Lexicon {
  return LexiconSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

function clamp(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+(?:'[a-z]+)?/g) ?? [];
}

/**
 * Word-level scorer: each lexicon word counts once, scaled by an intensifier
 * or flipped and halved by a negator directly before it. The text scores the
 * mean of its scored words.
 */
export class LexiconPolarityScorer implements PolarityScorer {
  private readonly polarity: ReadonlyMap<string, number>;
  private readonly intensifiers: ReadonlyMap<string, number>;
  private readonly negators: ReadonlySet<string>;

  constructor(lexicon: Lexicon = loadLexicon()) {
    this.polarity = new Map(Object.entries(lexicon.polarity));
    this.intensifiers = new Map(Object.entries(lexicon.intensifiers));
    this.negators = new Set(lexicon.negators);
  }

  score(text: string): number {
    const tokens = tokenize(text);
    const scores: number[] = [];

    tokens.forEach((token, index) => {
      const base = this.polarity.get(token);
      if (base === undefined) return;

      const previous = index > 0 ? tokens[index - 1] : undefined;
      let value = base;
      if (previous !== undefined) {
        if (this.negators.has(previous)) {
          value *= NEGATION_FACTOR;
        } else {
          value *= this.intensifiers.get(previous) ?? 1;
        }
      }
      scores.push(clamp(value));
    });

    if (scores.length === 0) {
      return 0;
    }
    return clamp(scores.reduce((acc, value) => acc + value, 0) / scores.length);
  }
}

export function labelForPolarity(polarity: number): SentimentLabel {
  if (polarity > POSITIVE_THRESHOLD) return "Positive";
  if (polarity < NEGATIVE_THRESHOLD) return "Negative";
  return "Neutral";
}

export function emptyTally(): SentimentTally {
  return { Positive: 0, Neutral: 0, Negative: 0 };
}

export class SentimentClassifier {
  constructor(private readonly scorer: PolarityScorer = new LexiconPolarityScorer()) {}

  classify(text: string): SentimentLabel {
    return labelForPolarity(this.scorer.score(text));
  }

  tally(texts: Iterable<string>): SentimentTally {
    const counts = emptyTally();
    for (const text of texts) {
      counts[this.classify(text)] += 1;
    }
    return counts;
  }
}
