/**
 * Pulls the first JSON value out of a model reply. Handles a leading BOM,
 * ```json fences, prose around the payload and trailing commas.
 * Returns null when no balanced object or array is found.
 */
export const extractJson = (raw: string): string | null => {
  let text = raw.trim();
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  const fenced = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/.exec(text);
  if (fenced?.[1]) {
    text = fenced[1].trim();
  }

  const balanced = firstBalanced(text);
  return balanced ? balanced.replace(/,\s*([}\]])/g, '$1') : null;
};

const firstBalanced = (input: string): string | null => {
  const objectStart = input.indexOf('{');
  const arrayStart = input.indexOf('[');
  const start =
    objectStart === -1
      ? arrayStart
      : arrayStart === -1
        ? objectStart
        : Math.min(objectStart, arrayStart);
  if (start < 0) return null;

  const open = input[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < input.length; i++) {
    const ch = input[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close && --depth === 0) return input.slice(start, i + 1);
  }
  return null;
};

export const parseJsonLoose = (raw: string): unknown => {
  const payload = extractJson(raw);
  if (payload === null) {
    return undefined;
  }
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
};
