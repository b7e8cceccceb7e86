/**
 * Response Text Extractor - turns whatever an inference server sent back into display text.
 *
 * Servers disagree on response shape (Ollama, llama.cpp, OpenAI-compatible, custom wrappers),
 * so mappings are run through an ordered list of shape matchers. The first matcher that
 * recognizes the mapping decides the text; unrecognized mappings are serialized as JSON.
 * This never throws.
 */

type JsonObject = Record<string, unknown>;

/** Returns the extracted text, or undefined when the mapping is not this shape. */
type ShapeMatcher = (obj: JsonObject) => string | undefined;

const SINGLE_FIELD_KEYS = ['text', 'output', 'result', 'response', 'completion'] as const;
const COMPLETION_ITEM_KEYS = ['data', 'content', 'text', 'output'] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyItem(item: unknown): string {
  if (typeof item === 'string') return item;
  try {
    return JSON.stringify(item) ?? String(item);
  } catch {
    return String(item);
  }
}

// { text: "..." }, { response: "..." } (Ollama), ...
const singleField: ShapeMatcher = (obj) => {
  for (const key of SINGLE_FIELD_KEYS) {
    const value = obj[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
};

// OpenAI-style { choices: [{ message: { content } }] } or { choices: [{ text }] }
const openAIChoices: ShapeMatcher = (obj) => {
  const choices = obj.choices;
  if (!Array.isArray(choices)) return undefined;

  const texts: string[] = [];
  for (const choice of choices) {
    if (!isObject(choice)) continue;
    if (isObject(choice.message)) {
      const content = choice.message.content;
      if (typeof content === 'string' && content) texts.push(content);
    } else if (typeof choice.text === 'string') {
      texts.push(choice.text);
    }
  }
  return texts.join('\n').trim();
};

// { completions: [{ data | content | text | output }] }
const completionsList: ShapeMatcher = (obj) => {
  const completions = obj.completions;
  if (!Array.isArray(completions)) return undefined;

  const texts: string[] = [];
  for (const completion of completions) {
    if (!isObject(completion)) continue;
    for (const key of COMPLETION_ITEM_KEYS) {
      if (!(key in completion)) continue;
      const value = completion[key];
      if (typeof value === 'string') {
        texts.push(value);
      } else if (Array.isArray(value)) {
        texts.push(...value.map(stringifyItem));
      }
    }
  }
  return texts.join('\n').trim();
};

export const SHAPE_MATCHERS: readonly ShapeMatcher[] = [singleField, openAIChoices, completionsList];

function serializeFallback(obj: JsonObject): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return String(obj);
  }
}

export function extractText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map(extractText)
      .filter(text => text.length > 0)
      .join('\n');
  }

  if (isObject(value)) {
    for (const matcher of SHAPE_MATCHERS) {
      const text = matcher(value);
      if (text !== undefined) return text;
    }
    return serializeFallback(value);
  }

  return String(value);
}
