// Parsing of JSON returned by an LLM that may wrap it in markdown fences

/**
 * Strip a leading ``` or ```json fence and a trailing ``` fence.
 */
export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('```')) {
    text = text.slice(3);
    if (text.startsWith('json')) text = text.slice(4);
    text = text.trim();
  }
  if (text.endsWith('```')) {
    text = text.slice(0, -3).trim();
  }
  return text;
}

/**
 * Parse fenced or bare JSON. Throws SyntaxError on invalid JSON.
 */
export function parseJsonOutput(raw: string): unknown {
  return JSON.parse(stripCodeFences(raw));
}

export const UNPARSED_PLACEHOLDER = 'Unable to parse structured output.';
