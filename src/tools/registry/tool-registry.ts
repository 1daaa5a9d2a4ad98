/**
 * ToolRegistry — in-memory tool provider.
 * Holds tool definitions by name, validates input and declared output with each
 * tool's Zod schemas, and unwraps tool Results into the throw-on-failure contract
 * of `ToolProvider.invoke`.
 */
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { z } from 'zod';

import { ToolExecutionError, ToolNotFoundError, ValidationError } from '@/core/errors.js';
import { unwrap } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type { ExecutableTool, ToolDescriptor, ToolProvider } from '../types.js';

export interface ToolRegistryOptions {
  logger: Logger;
}

export interface ToolRegistry extends ToolProvider {
  /** Register a tool. Replaces existing registration for the same name. */
  register(tool: ExecutableTool): void;

  /** Unregister a tool by name. Returns true if it was registered. */
  unregister(name: string): boolean;

  /** Get a tool by name. Returns undefined if not found. */
  get(name: string): ExecutableTool | undefined;

  /** Check if a tool exists in the registry. */
  has(name: string): boolean;

  /** List all registered tool names. */
  listAll(): string[];

  /** Run a registered tool by name. Throws ToolNotFoundError for unknown names. */
  execute(name: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Convert a Zod schema to a plain JSON Schema object for descriptors.
 */
export function toParameterSchema(schema: z.ZodType): Record<string, unknown> {
  const raw: Record<string, unknown> = { ...zodToJsonSchema(schema, { target: 'jsonSchema7' }) };
  delete raw['$schema'];
  return raw;
}

/**
 * Create a new ToolRegistry instance.
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const { logger } = options;
  const tools = new Map<string, ExecutableTool>();

  function validateInput(tool: ExecutableTool, params: Record<string, unknown>): unknown {
    const parsed = tool.inputSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      logger.warn('Tool input validation failed', {
        component: 'tool-registry',
        toolName: tool.name,
        issues,
      });
      throw new ValidationError(`Invalid input for tool "${tool.name}"`, {
        toolName: tool.name,
        issues,
      });
    }
    return parsed.data;
  }

  function validateOutput(tool: ExecutableTool, output: unknown): unknown {
    if (!tool.outputSchema) return output;
    const parsed = tool.outputSchema.safeParse(output);
    if (!parsed.success) {
      logger.warn('Tool output did not match its schema', {
        component: 'tool-registry',
        toolName: tool.name,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      throw new ToolExecutionError(tool.name, 'Output did not match the declared schema');
    }
    return parsed.data;
  }

  const registry: ToolRegistry = {
    register(tool: ExecutableTool): void {
      logger.info('Registering tool', {
        component: 'tool-registry',
        toolName: tool.name,
        category: tool.category,
      });
      tools.set(tool.name, tool);
    },

    unregister(name: string): boolean {
      const existed = tools.delete(name);
      if (existed) {
        logger.info('Unregistered tool', {
          component: 'tool-registry',
          toolName: name,
        });
      }
      return existed;
    },

    get(name: string): ExecutableTool | undefined {
      return tools.get(name);
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    listAll(): string[] {
      return [...tools.keys()];
    },

    listTools(): Promise<ToolDescriptor[]> {
      return Promise.resolve(
        [...tools.values()].map((tool) => ({
          name: tool.name,
          description: tool.description,
          category: tool.category,
          parameters: toParameterSchema(tool.inputSchema),
        })),
      );
    },

    resolve(name: string): ExecutableTool | undefined {
      return tools.get(name);
    },

    async invoke(callable, params, invokeOptions): Promise<unknown> {
      const input = validateInput(callable, params);

      logger.debug('Invoking tool', {
        component: 'tool-registry',
        toolName: callable.name,
        executionId: invokeOptions.executionId,
      });

      const result = await callable.execute(input, {
        signal: invokeOptions.signal,
        executionId: invokeOptions.executionId,
      });
      return validateOutput(callable, unwrap(result));
    },

    async execute(name, params, signal = new AbortController().signal): Promise<unknown> {
      const tool = tools.get(name);
      if (!tool) throw new ToolNotFoundError(name);
      return registry.invoke(tool, params, { signal });
    },
  };

  return registry;
}
