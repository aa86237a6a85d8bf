/**
 * Wake Word Matcher
 * Decides whether a transcript addresses the assistant, tolerating the
 * spelling noise speech-to-text produces ("gidion", "hey gideon,").
 */

export interface WakeWordMatch {
  matched: boolean;
  /** Best similarity across all variants, 0..1 */
  score: number;
  /** Variant that produced the best score ('' when nothing compared) */
  variant: string;
  /** Words of the transcript that were compared against the variant */
  matchedPhrase: string;
  /** Transcript with the matched phrase removed */
  remainingText: string;
}

export function normalizeTranscript(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Two-row dynamic programming table
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current[j] = Math.min(substitution, insertion, deletion);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/** 1 - distance / longer length; identical strings score 1. */
export function similarity(a: string, b: string): number {
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLength;
}

function noMatch(text: string): WakeWordMatch {
  return {
    matched: false,
    score: 0,
    variant: '',
    matchedPhrase: '',
    remainingText: text,
  };
}

export class WakeWordMatcher {
  private readonly variants: string[];
  private threshold: number;

  constructor(variants: readonly string[], threshold: number = 0.75) {
    this.variants = [...new Set(variants.map(normalizeTranscript).filter((v) => v.length > 0))];
    if (this.variants.length === 0) {
      throw new RangeError('WakeWordMatcher needs at least one non-empty variant');
    }
    this.threshold = WakeWordMatcher.clampThreshold(threshold);
  }

  matches(utteranceText: string): boolean {
    return this.match(utteranceText).matched;
  }

  match(utteranceText: string): WakeWordMatch {
    const normalized = normalizeTranscript(utteranceText);
    if (normalized.length === 0) return noMatch(normalized);

    const words = normalized.split(' ');
    let best = noMatch(normalized);
    let bestWordCount = 0;

    for (const variant of this.variants) {
      const variantWords = variant.split(' ').length;
      const minWindow = Math.max(1, variantWords - 1);
      const maxWindow = Math.min(words.length, variantWords + 1);

      for (let size = minWindow; size <= maxWindow; size++) {
        for (let start = 0; start + size <= words.length; start++) {
          const phrase = words.slice(start, start + size).join(' ');
          const score = similarity(phrase, variant);

          // Ties go to the longer phrase so the remaining command is cleaner
          if (score > best.score || (score === best.score && score > 0 && size > bestWordCount)) {
            bestWordCount = size;
            best = {
              matched: false,
              score,
              variant,
              matchedPhrase: phrase,
              remainingText: [...words.slice(0, start), ...words.slice(start + size)].join(' '),
            };
          }
        }
      }
    }

    return { ...best, matched: best.score >= this.threshold };
  }

  getThreshold(): number {
    return this.threshold;
  }

  setThreshold(threshold: number) {
    this.threshold = WakeWordMatcher.clampThreshold(threshold);
  }

  private static clampThreshold(threshold: number): number {
    return Math.max(0, Math.min(1, threshold));
  }
}
