export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ToolDeclaration {
  name: string;
  description: string;
}

/** One entry of the transcript an agent sends back to the model on every step. */
export type AgentTurn =
  | { kind: 'message'; role: ChatRole; content: string }
  | { kind: 'tool_call'; name: string; input: string }
  | { kind: 'tool_result'; name: string; output: string };

export type ModelStreamChunk =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; name: string; input: string };

export interface StreamChatRequest {
  system: string;
  turns: AgentTurn[];
  tools: ToolDeclaration[];
  temperature?: number;
}

export interface CompletionOptions {
  system?: string;
  temperature?: number;
}

export interface CompletionModel {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface ChatModel extends CompletionModel {
  streamChat(request: StreamChatRequest): AsyncIterable<ModelStreamChunk>;
}

export interface EmbeddingModel {
  embedTexts(texts: string[]): Promise<number[][]>;
}
