import { BashTools, bashToolDefinitions, type BashToolsOptions, type CommandRunner, type RunCommandInput } from './bash.js';

// Re-export tool definitions and types
export { bashToolDefinitions, runShellCommand } from './bash.js';
export type { CommandResult, CommandRunner, BashToolsOptions } from './bash.js';

// Combined tool definitions
export const allToolDefinitions = [...bashToolDefinitions];

// Tool executor class that wraps all tools
export class ToolExecutor {
  private bashTools: BashTools;

  constructor(options: BashToolsOptions, runner?: CommandRunner) {
    this.bashTools = new BashTools(options, runner);
  }

  async execute(toolName: string, args: Record<string, unknown>): Promise<object> {
    switch (toolName) {
      case 'bash':
        return this.bashTools.runCommand(args as RunCommandInput);

      default:
        throw new Error(`Unknown tool: ${toolName}`);
    }
  }
}
