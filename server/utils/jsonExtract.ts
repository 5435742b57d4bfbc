import JSON5 from 'json5';

/**
 * JSON recovery for model output: code fences, prose around the payload and
 * payloads cut off mid-object by the token limit.
 */

export const stripCodeFence = (value: string): string =>
  value.replace(/^\s*```(?:json5?|text)?\s*\r?\n?/i, '').replace(/```[\s\r\n]*$/, '').trim();

interface ScanState {
  start: number;
  end: number;
  inString: boolean;
  escapeNext: boolean;
  stack: string[];
}

const closerFor = (opener: string): string => (opener === '{' ? '}' : ']');

const closersOf = (stack: readonly string[]): string => stack.slice().reverse().map(closerFor).join('');

/** Walks the first top-level object or array, tracking strings and nesting. */
const scan = (text: string): ScanState => {
  const state: ScanState = { start: -1, end: -1, inString: false, escapeNext: false, stack: [] };

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (state.inString) {
      if (state.escapeNext) {
        state.escapeNext = false;
      } else if (char === '\\') {
        state.escapeNext = true;
      } else if (char === '"') {
        state.inString = false;
      }
      continue;
    }

    if (char === '"') {
      if (state.start !== -1) state.inString = true;
      continue;
    }

    if (char === '{' || char === '[') {
      if (state.stack.length === 0) state.start = i;
      state.stack.push(char);
      continue;
    }

    if ((char === '}' || char === ']') && state.stack.length > 0) {
      // A mismatched closer drops its opener as well, so the scan cannot stall
      state.stack.pop();
      if (state.stack.length === 0) {
        state.end = i;
        break;
      }
    }
  }

  return state;
};

/**
 * The first balanced JSON object/array in `value`. A truncated payload is
 * closed using the stack of unmatched openers.
 */
export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const state = scan(trimmed);
  if (state.start === -1) return null;
  if (state.end !== -1) return trimmed.slice(state.start, state.end + 1);

  let candidate = trimmed.slice(state.start);
  if (state.inString) {
    if (state.escapeNext) candidate = candidate.slice(0, -1);
    candidate += '"';
  }
  return `${candidate}${closersOf(state.stack)}`.trim();
};

/** From the first '{' to the last '}'. */
export const extractJsonObjectNaive = (value: string): string | null => {
  const start = value.indexOf('{');
  const end = value.lastIndexOf('}');
  if (start === -1 || end < start) return null;
  return value.slice(start, end + 1).trim();
};

export const extractJson = (rawResponse: string): string | null => {
  const stripped = stripCodeFence(rawResponse);
  return extractBalancedJson(stripped) ?? extractJsonObjectNaive(stripped);
};

const parses = (text: string): boolean => {
  try {
    JSON5.parse(text);
    return true;
  } catch {
    return false;
  }
};

const TRIM_STEPS = [80, 160, 240, 360, 520, 720, 1000];

/**
 * Like {@link extractJson}, but when the candidate does not parse, drops
 * progressively more of the tail and re-closes it until a prefix parses.
 */
export const extractJsonRobust = (rawResponse: string): string | null => {
  const base = extractJson(rawResponse);
  if (!base) return null;
  if (parses(base)) return base;

  for (const step of TRIM_STEPS) {
    if (base.length <= step) break;
    const rebalanced = extractBalancedJson(base.slice(0, base.length - step));
    if (rebalanced && parses(rebalanced)) return rebalanced;
  }
  return null;
};
