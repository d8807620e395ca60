import { MalformedOutputError } from '../lib/errors.js';

export type ParseAttempt = { ok: true; value: unknown } | { ok: false };

export type JsonStrategy = {
  name: string;
  parse: (text: string) => ParseAttempt;
};

function tryParse(text: string | undefined): ParseAttempt {
  if (text === undefined) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function fencedBody(text: string): string | undefined {
  const fence = text.match(/```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i);
  return fence?.[1]?.trim();
}

// Balanced open..close spans in order of their opener, skipping brackets inside string literals.
export function* balancedSpans(text: string, open: '[' | '{', close: ']' | '}'): Generator<string> {
  for (let start = text.indexOf(open); start !== -1; start = text.indexOf(open, start + 1)) {
    let depth = 0;
    let inStr = false;
    let esc = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inStr) {
        if (esc) {
          esc = false;
          continue;
        }
        if (ch === '\\') {
          esc = true;
          continue;
        }
        if (ch === '"') {
          inStr = false;
        }
        continue;
      }

      if (ch === '"') {
        inStr = true;
        continue;
      }

      if (ch === open) depth++;
      if (ch === close) depth--;

      if (depth === 0) {
        yield text.slice(start, i + 1);
        break;
      }
    }
  }
}

export function findJsonSlice(text: string, open: '[' | '{', close: ']' | '}'): string | null {
  for (const span of balancedSpans(text, open, close)) return span;
  return null;
}

export const parseDirect: JsonStrategy = {
  name: 'direct',
  parse: (text) => tryParse(text.trim()),
};

export const parseFencedBlock: JsonStrategy = {
  name: 'fenced-block',
  parse: (text) => tryParse(fencedBody(text)),
};

// Tries each balanced [...] span until one parses, so `Issues [draft]: [...]` still yields the list.
export const parseBracketSpan: JsonStrategy = {
  name: 'bracket-span',
  parse: (text) => {
    for (const span of balancedSpans(text, '[', ']')) {
      const attempt = tryParse(span);
      if (attempt.ok) return attempt;
    }
    return { ok: false };
  },
};

export const ARRAY_STRATEGIES: readonly JsonStrategy[] = [parseDirect, parseFencedBlock, parseBracketSpan];

/**
 * Runs the strategies in order and returns the first result that is an array,
 * together with the name of the strategy that produced it.
 */
export function extractJsonArray(
  text: string,
  strategies: readonly JsonStrategy[] = ARRAY_STRATEGIES
): { value: unknown[]; strategy: string } | null {
  for (const s of strategies) {
    const attempt = s.parse(text);
    if (attempt.ok && Array.isArray(attempt.value)) return { value: attempt.value, strategy: s.name };
  }
  return null;
}

export function requireJsonArray(text: string): { value: unknown[]; strategy: string } {
  const found = extractJsonArray(text);
  if (!found) {
    throw new MalformedOutputError('Reply does not contain a JSON array', { preview: text.slice(0, 200) });
  }
  return found;
}
