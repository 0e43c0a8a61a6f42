import type {
  ToolCallContext,
  ToolCallResult,
  ToolDefinition,
  ToolDescriptor
} from '../core/contracts/tool';
import { ToolNotFoundError } from '../core/errors';
import type { SearchExecutor } from '../search/search-executor';
import { createSearchProductsTool } from './search-products';

/**
 * Tools are registered once at startup and the registry is then locked.
 * After locking only lookups and calls are allowed.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private locked = false;

  /** Re-registering a name that is already present is a no-op, even when locked. */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      return;
    }

    if (this.locked) {
      throw new Error(`Tool registry is locked. Cannot register new tool ${tool.name} after startup.`);
    }

    this.tools.set(tool.name, tool);
  }

  lock(): void {
    this.locked = true;
  }

  isLocked(): boolean {
    return this.locked;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Public descriptors in registration order, handlers stripped. */
  describe(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema
    }));
  }

  async call(name: string, args: unknown, context: ToolCallContext = {}): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool.handler(args, context);
  }
}

export function initializeToolRegistry(registry: ToolRegistry, deps: { executor: SearchExecutor }): ToolRegistry {
  registry.register(createSearchProductsTool(deps.executor));
  registry.lock();
  return registry;
}
