import type { ToolParameters, ToolResult, ToolSpec } from '@toolloop/shared';

export interface LocalToolDefinition {
  name: string;
  description: string;
  parameters?: ToolParameters;
  execute(args: Record<string, unknown>): Promise<ToolResult | string>;
}

/** A tool implemented in-process. Local tools carry no owner. */
export class LocalTool implements ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameters;
  private readonly handler: LocalToolDefinition['execute'];

  constructor(definition: LocalToolDefinition) {
    this.name = definition.name;
    this.description = definition.description;
    this.parameters = definition.parameters ?? { type: 'object', properties: {} };
    this.handler = definition.execute;
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const result = await this.handler(args);
    return typeof result === 'string' ? { content: result } : result;
  }
}

export function defineTool(definition: LocalToolDefinition): LocalTool {
  return new LocalTool(definition);
}
