import logger from './logger.js';

const MAX_AGGRESSIVE_REPAIR_CHARS = 50_000;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/** Appends the closers of any braces or brackets left open by a truncated response. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for model output that may wrap the object in
 * markdown fences or prose, leave trailing commas, use bare NULL tokens or
 * stop mid-object. Returns the parsed value, or null when nothing parses.
 * Callers validate the shape themselves.
 */
export function repairJSON(text: string): unknown {
  if (!text) return null;

  // Fenced block anywhere in the text wins over the raw text
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(text);
  let cleaned = (fenced ? fenced[1] : text).trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start < 0) return null;

  const lastClose = cleaned.lastIndexOf(closeChar);
  cleaned = lastClose > start ? cleaned.slice(start, lastClose + 1) : cleaned.slice(start);
  const sliced = tryParse(cleaned);
  if (sliced.ok) return sliced.value;

  const noTrailing = cleaned
    .replace(/,\s*([\]}])/g, '$1')
    .replace(/:\s*NULL\b/g, ': null');
  const relaxed = tryParse(noTrailing);
  if (relaxed.ok) return relaxed.value;

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > MAX_AGGRESSIVE_REPAIR_CHARS) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  const aggressive = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"')
    .replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const quoted = tryParse(aggressive);
  if (quoted.ok) return quoted.value;

  const closed = closePartial(aggressive);
  if (closed !== aggressive) {
    const truncated = tryParse(closed);
    if (truncated.ok) return truncated.value;
  }

  logger.debug({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
