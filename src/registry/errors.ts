/**
 * Raised when a tool name is registered twice.
 */
export class DuplicateToolError extends Error {
  public readonly kind = "duplicate_tool";

  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = "DuplicateToolError";
  }
}

/**
 * Raised when a tool definition is rejected at registration.
 */
export class InvalidToolDefinitionError extends Error {
  public readonly kind = "invalid_tool_definition";

  constructor(
    public readonly toolName: string,
    reason: string,
  ) {
    super(`Invalid definition for tool "${toolName}": ${reason}`);
    this.name = "InvalidToolDefinitionError";
  }
}

/**
 * Raised when a tool name is not in the registry.
 */
export class UnknownToolError extends Error {
  public readonly kind = "unknown_tool";

  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
  }
}
