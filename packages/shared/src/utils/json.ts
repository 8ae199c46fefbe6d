import { MalformedResponseError } from './errors.js';

/**
 * Pull a JSON object out of model output. Models wrap JSON in code fences
 * or surround it with prose often enough that a bare JSON.parse is not enough.
 */
export function extractJson(content: string, component = 'model output'): unknown {
  let cleaned = content.trim();
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```\s*$/, '');
  }

  try {
    return JSON.parse(cleaned);
  } catch {
    const match = cleaned.match(/\{[\s\S]*\}/);
    if (!match) {
      throw new MalformedResponseError(component, 'No JSON object found in response');
    }
    try {
      return JSON.parse(match[0]);
    } catch (err) {
      throw new MalformedResponseError(component, 'Response contained invalid JSON', { cause: err });
    }
  }
}
