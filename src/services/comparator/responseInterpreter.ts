/**
 * Turns the comparator's free-form reply into a Verdict.
 *
 * Structured JSON is tried first, then keyword/number heuristics. Anything that
 * cannot be interpreted yields the fallback verdict, which is never an approval.
 */

export interface Verdict {
  similarityScore: number; // 0..1
  confidenceScore: number; // 0..1
  isValid: boolean;
  notes: string;
  keyMatches: string[];
  keyDifferences: string[];
}

export const FALLBACK_NOTES = 'AI validation failed - manual review required';
const DEFAULT_NOTES = 'AI validation completed';
const HEURISTIC_DEFAULT_SCORE = 0.5;

const POSITIVE_WORDS = ['valid', 'match', 'same', 'correct'];
const NEGATIVE_WORDS = ['invalid', 'different', 'not match', 'incorrect'];
// "valid" and "correct" inside these do not count as positive hits
const NEGATED_FORMS = /invalid|incorrect/g;

class InterpretationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterpretationError';
  }
}

export function fallbackVerdict(): Verdict {
  return {
    similarityScore: 0,
    confidenceScore: 0,
    isValid: false,
    notes: FALLBACK_NOTES,
    keyMatches: [],
    keyDifferences: [],
  };
}

export function interpretComparatorResponse(rawText: string): Verdict {
  try {
    return parseStructured(rawText) ?? parseHeuristically(rawText) ?? fallbackVerdict();
  } catch {
    return fallbackVerdict();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Values above 1 are read as percentages; the result is clamped to [0, 1]
 */
function normalizeScore(value: number): number {
  const scaled = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

function readScore(value: unknown): number {
  if (value === undefined || value === null) {
    return 0;
  }
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InterpretationError(`Score is not numeric: ${String(value)}`);
  }
  return normalizeScore(parsed);
}

// Only an explicit yes approves
function readFlag(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  return typeof value === 'string' && value.trim().toLowerCase() === 'true';
}

function readNotes(value: unknown): string {
  if (value === undefined || value === null) {
    return DEFAULT_NOTES;
  }
  if (typeof value !== 'string') {
    throw new InterpretationError('notes is not a string');
  }
  return value;
}

function readList(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InterpretationError('Expected a list of strings');
  }
  return value
    .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
    .map(String);
}

/**
 * Greedy span from the first "{" to the last "}". Null when there is no span
 * or it is not valid JSON.
 */
function parseStructured(text: string): Verdict | null {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(match[0]);
  } catch {
    return null;
  }

  if (!isRecord(data)) {
    throw new InterpretationError('Structured response is not an object');
  }

  return {
    similarityScore: readScore(data.similarity_score),
    confidenceScore: readScore(data.confidence_score),
    isValid: readFlag(data.is_valid),
    notes: readNotes(data.notes),
    keyMatches: readList(data.key_matches),
    keyDifferences: readList(data.key_differences),
  };
}

function findScore(text: string, label: string): number | null {
  const match = new RegExp(`${label}[:\\s]+(\\d+\\.?\\d*)`, 'i').exec(text);
  return match ? normalizeScore(parseFloat(match[1])) : null;
}

/**
 * Null when the text carries no score and no verdict keyword at all
 */
function parseHeuristically(text: string): Verdict | null {
  const similarity = findScore(text, 'similarity');
  const confidence = findScore(text, 'confidence');

  const lower = text.toLowerCase();
  const withoutNegated = lower.replace(NEGATED_FORMS, ' ');

  let isValid: boolean | null = null;
  if (POSITIVE_WORDS.some((word) => withoutNegated.includes(word))) {
    isValid = true;
  } else if (NEGATIVE_WORDS.some((word) => lower.includes(word))) {
    isValid = false;
  }

  if (similarity === null && confidence === null && isValid === null) {
    return null;
  }

  return {
    similarityScore: similarity ?? HEURISTIC_DEFAULT_SCORE,
    confidenceScore: confidence ?? HEURISTIC_DEFAULT_SCORE,
    isValid: isValid ?? false,
    notes: text,
    keyMatches: [],
    keyDifferences: [],
  };
}
