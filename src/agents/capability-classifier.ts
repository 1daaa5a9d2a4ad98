/**
 * Keyword heuristics that map free text to capabilities.
 * The coordinator uses them to pick agents; the tool executor reuses the
 * same families to pick tools.
 */
import type { AgentCapability, CapabilityClassifier } from './types.js';

/** Capability families recognised in text, in the order they are reported. */
export const CAPABILITY_KEYWORDS: ReadonlyArray<readonly [AgentCapability, readonly string[]]> = [
  ['math', ['calculate', 'math', 'equation', 'formula', '+', '-', '*', '/']],
  ['code_execution', ['code', 'program', 'script', 'execute', 'run']],
  ['search', ['search', 'find', 'lookup', 'information', 'news']],
  ['weather', ['weather', 'temperature', 'forecast', 'climate']],
  ['research', ['research', 'analyze', 'study', 'investigate']],
];

/** Capabilities whose keywords occur in `text` (case-insensitive substring match). */
export function matchCapabilities(text: string): AgentCapability[] {
  const lower = text.toLowerCase();
  return CAPABILITY_KEYWORDS.filter(([, keywords]) =>
    keywords.some((keyword) => lower.includes(keyword)),
  ).map(([capability]) => capability);
}

/**
 * Create the default classifier. `reasoning` is always required, since
 * every query needs someone to put the answer together.
 */
export function createKeywordClassifier(): CapabilityClassifier {
  return {
    classify(query: string): AgentCapability[] {
      const required = matchCapabilities(query);
      if (!required.includes('reasoning')) required.push('reasoning');
      return required;
    },
  };
}
