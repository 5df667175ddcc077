import type { ParamSpec } from './delegation.js';

export type MessageKind = 'info-only' | 'status-update' | 'message';

export type ToolExecutionMode = 'auto' | 'require-any' | 'none';

export interface JsonSchemaProperty {
  type: string;
  description?: string;
  format?: string;
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
}

/** JSON Schema of a function's arguments, as exposed to the model. */
export interface JsonSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchema;
  /** Source schema the JSON Schema was generated from. */
  params: ParamSpec[];
}

export type ToolArguments = Record<string, unknown>;

export interface ToolFunction {
  definition: ToolDefinition;
  invoke: (args: ToolArguments) => Promise<string>;
}

/** Information about an assistant (persona) the host can run sessions with. */
export interface AssistantInfo {
  name: string;
  description?: string;
}

/**
 * A chat session owned by the host application.
 *
 * `sendMessage` resolves once the model has finished responding to the message,
 * including any tool calls it made along the way.
 */
export interface SessionHandle {
  readonly id: string;
  readonly parentSessionId?: string;
  toolExecutionMode: ToolExecutionMode;
  sendMessage(kind: MessageKind, text: string): Promise<void>;
  registerTools(tools: Map<string, ToolFunction[]>): void;
  /** Abort controller that stops the session's in-flight activity, when the host exposes one. */
  cancellationControl(): AbortController | undefined;
  listAssistants(): AssistantInfo[];
  dispose(): Promise<void>;
}

export interface Host {
  createChildSession(parent: SessionHandle, assistantName: string): Promise<SessionHandle>;
  listAssistants(name?: string): Promise<AssistantInfo[]>;
  /** Resolves `undefined` when the session does not exist. */
  openSession(sessionId: string): Promise<SessionHandle | undefined>;
}

export type TemplateBindings = Record<string, unknown>;

export interface TemplateEngine {
  /** Never throws; returns the raw template when rendering fails. */
  render(template: string, bindings: TemplateBindings): string;
}

export function isSessionHandle(value: unknown): value is SessionHandle {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'sendMessage' in value &&
    typeof value.sendMessage === 'function' &&
    'registerTools' in value &&
    typeof value.registerTools === 'function'
  );
}
