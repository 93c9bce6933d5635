/**
 * Known context limits (total tokens per request) and tokenizer encodings
 */

export type EncodingName = 'cl100k_base' | 'o200k_base';

interface ModelSpec {
  prefix: string;
  contextWindow: number;
  encoding: EncodingName;
}

// Longest prefix wins, so order does not matter
const MODEL_SPECS: ModelSpec[] = [
  { prefix: 'gpt-3.5-turbo', contextWindow: 16385, encoding: 'cl100k_base' },
  { prefix: 'gpt-4', contextWindow: 8192, encoding: 'cl100k_base' },
  { prefix: 'gpt-4-32k', contextWindow: 32768, encoding: 'cl100k_base' },
  { prefix: 'gpt-4-turbo', contextWindow: 128000, encoding: 'cl100k_base' },
  { prefix: 'gpt-4o', contextWindow: 128000, encoding: 'o200k_base' },
  { prefix: 'gpt-4.1', contextWindow: 1047576, encoding: 'o200k_base' },
  { prefix: 'o1', contextWindow: 200000, encoding: 'o200k_base' },
  { prefix: 'o3', contextWindow: 200000, encoding: 'o200k_base' },
  { prefix: 'o4-mini', contextWindow: 200000, encoding: 'o200k_base' }
];

export const DEFAULT_CONTEXT_WINDOW = 8192;

function findSpec(model: string): ModelSpec | undefined {
  let best: ModelSpec | undefined;
  for (const spec of MODEL_SPECS) {
    if (model.startsWith(spec.prefix) && (!best || spec.prefix.length > best.prefix.length)) {
      best = spec;
    }
  }
  return best;
}

export function contextWindowFor(model: string): number {
  return findSpec(model)?.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
}

export function encodingFor(model: string): EncodingName {
  return findSpec(model)?.encoding ?? 'cl100k_base';
}
