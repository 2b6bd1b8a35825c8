/**
 * Subsequence fuzzy scoring.
 *
 * Every query character must match a text character in order (case
 * insensitive). A placement scores
 *
 *   per matched char   SCORE_MATCH
 *                    + BONUS_BOUNDARY  when it starts a word
 *                    + BONUS_CASE      when the case matches exactly
 *                    + BONUS_CONSECUTIVE when it directly follows the previous match
 *   per gap           -(PENALTY_GAP_START + PENALTY_GAP_EXTENSION * (length - 1))
 *
 * and the best placement is found with a dynamic program over
 * (query char, text position), so the score is O(query * text).
 * Characters before the first match are free.
 */

export const SCORE_MATCH = 16;
export const BONUS_BOUNDARY = 8;
export const BONUS_CONSECUTIVE = 6;
export const BONUS_CASE = 2;
export const PENALTY_GAP_START = 3;
export const PENALTY_GAP_EXTENSION = 1;

const NONE = -1;
const NEG_INF = Number.NEGATIVE_INFINITY;

export interface FuzzyScore {
  score: number;
  /** Indices into the text of the matched characters, ascending */
  positions: number[];
}

function isWordChar(ch: string): boolean {
  return /[\p{L}\p{N}]/u.test(ch);
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/** A position starts a word: text start, after a separator, or a lower-to-upper hump. */
export function isBoundary(text: string, index: number): boolean {
  if (index === 0) return true;
  const prev = text[index - 1];
  const ch = text[index];
  if (!isWordChar(prev)) return isWordChar(ch);
  return isUpper(ch) && !isUpper(prev);
}

/**
 * Highest score any text could reach for a query of this length when it
 * offers `boundaries` word starts.
 */
export function upperBound(queryLength: number, boundaries: number): number {
  if (queryLength === 0) return 0;
  return (
    queryLength * (SCORE_MATCH + BONUS_CASE) +
    Math.min(queryLength, boundaries) * BONUS_BOUNDARY +
    (queryLength - 1) * BONUS_CONSECUTIVE
  );
}

export function countBoundaries(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (isBoundary(text, i)) count++;
  }
  return count;
}

/** Cheap case-insensitive subsequence test. */
export function isSubsequence(lowerQuery: string, lowerText: string): boolean {
  let qi = 0;
  for (let ti = 0; ti < lowerText.length && qi < lowerQuery.length; ti++) {
    if (lowerText[ti] === lowerQuery[qi]) qi++;
  }
  return qi === lowerQuery.length;
}

/**
 * Scores `query` against `text`; null when the query is not a subsequence.
 * Lowercasing is done per code unit so positions index the original text.
 */
export function fuzzyScore(query: string, text: string): FuzzyScore | null {
  const m = query.length;
  const n = text.length;
  if (m === 0 || m > n) return null;

  const lowerQuery = foldCase(query);
  const lowerText = foldCase(text);
  if (!isSubsequence(lowerQuery, lowerText)) return null;

  const bonus = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    bonus[i] = isBoundary(text, i) ? BONUS_BOUNDARY : 0;
  }

  // score[j * n + i]: best score with query[0..j] placed and query[j] on text[i]
  const score = new Float64Array(m * n).fill(NEG_INF);
  const back = new Int32Array(m * n).fill(NONE);

  for (let j = 0; j < m; j++) {
    let carry = NEG_INF;
    let carryFrom = NONE;
    for (let i = j; i < n; i++) {
      if (j > 0 && i >= 2) {
        // Extend every pending gap by one, then open a gap after text[i - 2]
        carry -= PENALTY_GAP_EXTENSION;
        const opened = score[(j - 1) * n + (i - 2)] - PENALTY_GAP_START;
        if (opened > carry) {
          carry = opened;
          carryFrom = i - 2;
        }
      }
      if (lowerText[i] !== lowerQuery[j]) continue;

      const own = SCORE_MATCH + bonus[i] + (text[i] === query[j] ? BONUS_CASE : 0);
      if (j === 0) {
        score[i] = own;
        continue;
      }
      const adjacent = score[(j - 1) * n + (i - 1)] + BONUS_CONSECUTIVE;
      if (adjacent >= carry && adjacent > NEG_INF) {
        score[j * n + i] = own + adjacent;
        back[j * n + i] = i - 1;
      } else if (carry > NEG_INF) {
        score[j * n + i] = own + carry;
        back[j * n + i] = carryFrom;
      }
    }
  }

  let best = NEG_INF;
  let end = NONE;
  const last = (m - 1) * n;
  for (let i = m - 1; i < n; i++) {
    if (score[last + i] > best) {
      best = score[last + i];
      end = i;
    }
  }
  if (end === NONE) return null;

  const positions = new Array<number>(m);
  for (let j = m - 1, i = end; j >= 0; j--) {
    positions[j] = i;
    i = back[j * n + i];
  }
  return { score: best, positions };
}

/**
 * Lowercases code unit by code unit, keeping the length of `s`, so indices
 * into the folded string are indices into the original.
 */
export function foldCase(s: string): string {
  let folded = '';
  for (let i = 0; i < s.length; i++) {
    const lower = s[i].toLowerCase();
    folded += lower.length === 1 ? lower : s[i];
  }
  return folded;
}
