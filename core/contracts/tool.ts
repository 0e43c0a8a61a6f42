export interface JsonSchema {
  type: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
  additionalProperties?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

export interface ToolContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: ToolContent[];
}

export interface ToolCallContext {
  requestId?: string;
  signal?: AbortSignal;
}

export type ToolHandler = (args: unknown, context: ToolCallContext) => Promise<ToolCallResult>;

export interface ToolDefinition extends ToolDescriptor {
  handler: ToolHandler;
}
