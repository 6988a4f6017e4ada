export {
  Toolbelt,
  defaultToolbelt,
  tool,
  listTools,
  execute,
  executeSync
} from './core/toolbelt.js'
export type { ToolOptions, ToolbeltOptions, ToolInput } from './core/toolbelt.js'
export { ToolRegistry } from './core/tool-registry.js'
export { resolveTool } from './core/resolver.js'
export type { Resolution } from './core/resolver.js'
export { inferSchema, inferType, toJsonSchema } from './core/schema.js'
export type { JsonSchema } from './core/schema.js'
export { ToolbeltError, DuplicateToolError, ToolDefinitionError } from './core/errors.js'
export { createLogger } from './core/logger.js'
export { loadConfig, loadConfigWithDotenv } from './config/load.js'
export type { ToolbeltConfig } from './config/schema.js'
export { DEFAULT_GROUP, QUALIFIER } from './core/types.js'
export type {
  DuplicatePolicy,
  EnumValue,
  ExecutionMode,
  Logger,
  LogLevel,
  ParameterSchema,
  ParameterShape,
  ParameterSpec,
  ToolError,
  ToolErrorKind,
  ToolFailure,
  ToolFunction,
  ToolListing,
  ToolRecord,
  ToolResult,
  ToolSuccess,
  TypeKind
} from './core/types.js'
