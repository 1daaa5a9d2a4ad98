/**
 * Keyword tool selection and parameter extraction for the tool executor.
 */
import { matchCapabilities } from './capability-classifier.js';
import type { AgentCapability, ToolSelector } from './types.js';

/** Substring a tool name must contain to serve each capability family. */
const TOOL_NAME_HINTS: Partial<Record<AgentCapability, string>> = {
  math: 'math',
  code_execution: 'code',
  search: 'search',
  weather: 'weather',
};

const SEARCH_PREFIXES = ['search for', 'find', 'lookup', 'information about'] as const;

/** Runs of digits, operators and parentheses; the first one with an operator is the expression. */
const EXPRESSION_CANDIDATE = /[\d.(][\d\s.+\-*/%^()]*[\d)]/g;
const HAS_OPERATOR = /[\d)]\s*(?:\*\*|[-+*/%^])\s*[\d.(+-]/;

/** First arithmetic expression in `text`, e.g. `"15 * 23"` from "Calculate 15 * 23". */
export function extractExpression(text: string): string | undefined {
  for (const match of text.matchAll(EXPRESSION_CANDIDATE)) {
    const candidate = match[0].trim();
    if (HAS_OPERATOR.test(candidate)) return candidate;
  }
  return undefined;
}

/** Text following the first search phrase, with its original casing. */
export function extractSearchQuery(text: string): string | undefined {
  const lower = text.toLowerCase();
  for (const prefix of SEARCH_PREFIXES) {
    const index = lower.indexOf(prefix);
    if (index === -1) continue;
    const query = text.slice(index + prefix.length).trim();
    if (query) return query;
  }
  return undefined;
}

export function createKeywordToolSelector(): ToolSelector {
  return {
    selectTools(task, requiredTools, availableTools): string[] {
      if (requiredTools.length > 0) {
        return requiredTools.filter((tool) => availableTools.includes(tool));
      }

      const selected: string[] = [];
      for (const capability of matchCapabilities(task)) {
        const hint = TOOL_NAME_HINTS[capability];
        if (hint === undefined) continue;
        for (const tool of availableTools) {
          if (tool.toLowerCase().includes(hint) && !selected.includes(tool)) selected.push(tool);
        }
      }
      return selected;
    },

    extractParameters(task, toolName): Record<string, unknown> {
      const name = toolName.toLowerCase();

      if (name.includes('math')) {
        const expression = extractExpression(task);
        return expression === undefined ? {} : { expression };
      }
      if (name.includes('search')) {
        const query = extractSearchQuery(task);
        return query === undefined ? {} : { query };
      }
      if (name.includes('weather')) {
        return { location: 'current' };
      }
      return {};
    },
  };
}
