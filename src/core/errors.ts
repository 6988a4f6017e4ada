/** Base class for programming-contract violations raised at registration time. */
export class ToolbeltError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Raised when a qualified name is registered twice under the `reject` policy. */
export class DuplicateToolError extends ToolbeltError {
  constructor(
    readonly qualifiedName: string,
    readonly existingSource?: string
  ) {
    super(
      existingSource
        ? `tool already registered: ${qualifiedName} (defined at ${existingSource})`
        : `tool already registered: ${qualifiedName}`
    )
  }
}

/** Raised when a tool definition cannot form a valid record. */
export class ToolDefinitionError extends ToolbeltError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
