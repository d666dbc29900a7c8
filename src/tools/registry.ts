/**
 * Tool registry
 *
 * Central place the executor runs tools through. Every call is logged with
 * its outcome; failures are logged and rethrown.
 */

import { describeCause } from '../errors.js';
import type { ToolName } from '../trace/types.js';

export type ToolHandler = (input: string) => unknown | Promise<unknown>;

export interface RegisterToolOptions {
  description: string;
  /** Research questions cannot be answered well without this tool. */
  requiredForResearch?: boolean;
}

export interface ToolInfo {
  name: ToolName;
  description: string;
  requiredForResearch: boolean;
  executions: number;
}

export interface ToolExecutionRecord {
  tool: ToolName;
  timestamp: string;
  input: string;
  success: boolean;
  error?: string;
}

interface RegisteredTool extends ToolInfo {
  handler: ToolHandler;
}

export class ToolRegistry {
  private readonly tools = new Map<ToolName, RegisteredTool>();
  private log: ToolExecutionRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  register(name: ToolName, handler: ToolHandler, options: RegisterToolOptions): this {
    this.tools.set(name, {
      name,
      handler,
      description: options.description,
      requiredForResearch: options.requiredForResearch ?? false,
      executions: 0,
    });
    return this;
  }

  has(name: ToolName): boolean {
    return this.tools.has(name);
  }

  async execute(name: ToolName, input: string): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      const available = [...this.tools.keys()].join(', ') || 'none';
      throw new Error(`Tool '${name}' not registered. Available: ${available}`);
    }

    const timestamp = this.now().toISOString();
    try {
      const result = await tool.handler(input);
      tool.executions += 1;
      this.log.push({ tool: name, timestamp, input, success: true });
      return result;
    } catch (err) {
      this.log.push({ tool: name, timestamp, input, success: false, error: describeCause(err) });
      throw err;
    }
  }

  list(): ToolInfo[] {
    return [...this.tools.values()].map(({ name, description, requiredForResearch, executions }) => ({
      name,
      description,
      requiredForResearch,
      executions,
    }));
  }

  requiredTools(): ToolName[] {
    return this.list()
      .filter((tool) => tool.requiredForResearch)
      .map((tool) => tool.name);
  }

  executionLog(): ToolExecutionRecord[] {
    return this.log.map((record) => ({ ...record }));
  }

  resetLog(): void {
    this.log = [];
  }
}
