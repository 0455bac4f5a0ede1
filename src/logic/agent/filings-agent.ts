import { Logger } from '@nestjs/common';
import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { AgentTurn, ChatMessage, ChatModel, ToolDeclaration } from '../gemini/types';
import { QueryEngineTool } from '../query-engines/types';

export const DEFAULT_MAX_FUNCTION_CALLS = 3;

export interface FilingsAgentOptions {
  systemPrompt: string;
  chatHistory: ChatMessage[];
  maxFunctionCalls?: number;
  temperature?: number;
  verbose?: boolean;
}

interface PendingToolCall {
  name: string;
  input: string;
}

/**
 * Tool-using chat agent. Each model step is streamed; text is yielded as it
 * arrives, tool calls are executed and fed back until the model answers
 * without calling a tool. Once the per-turn call budget is spent the tools
 * are no longer offered, which forces a final text answer.
 */
export class FilingsAgent {
  private readonly logger = new Logger(FilingsAgent.name);
  private readonly toolsByName: Map<string, QueryEngineTool>;
  private readonly declarations: ToolDeclaration[];
  private readonly maxFunctionCalls: number;

  constructor(
    private readonly llm: ChatModel,
    readonly tools: QueryEngineTool[],
    private readonly callbacks: CallbackManager,
    readonly options: FilingsAgentOptions,
  ) {
    this.toolsByName = new Map(tools.map(tool => [tool.name, tool]));
    this.declarations = tools.map(tool => ({ name: tool.name, description: tool.metadata.description }));
    this.maxFunctionCalls = options.maxFunctionCalls ?? DEFAULT_MAX_FUNCTION_CALLS;
  }

  async *streamChat(message: string): AsyncGenerator<string> {
    const turns: AgentTurn[] = [
      ...this.options.chatHistory.map((entry): AgentTurn => ({ kind: 'message', role: entry.role, content: entry.content })),
      { kind: 'message', role: 'user', content: message },
    ];
    let functionCalls = 0;

    for (;;) {
      const offerTools = functionCalls < this.maxFunctionCalls && this.declarations.length > 0;
      const calls: PendingToolCall[] = [];
      let text = '';

      const llmEventId = this.callbacks.onEventStart(CBEventType.LLM, { queryStr: message });
      try {
        const stream = this.llm.streamChat({
          system: this.options.systemPrompt,
          turns,
          tools: offerTools ? this.declarations : [],
          temperature: this.options.temperature ?? 0,
        });
        for await (const chunk of stream) {
          if (chunk.kind === 'tool_call') {
            calls.push({ name: chunk.name, input: chunk.input });
          } else {
            text += chunk.text;
            yield chunk.text;
          }
        }
      } catch (error) {
        this.callbacks.onEventEnd(CBEventType.LLM, { exception: error }, llmEventId);
        throw error;
      }
      this.callbacks.onEventEnd(CBEventType.LLM, { response: text }, llmEventId);

      if (calls.length === 0 || !offerTools) {
        return;
      }
      if (text) {
        turns.push({ kind: 'message', role: 'assistant', content: text });
      }
      for (const call of calls.slice(0, this.maxFunctionCalls - functionCalls)) {
        functionCalls += 1;
        const output = await this.callTool(call);
        turns.push({ kind: 'tool_call', name: call.name, input: call.input });
        turns.push({ kind: 'tool_result', name: call.name, output });
      }
    }
  }

  private async callTool(call: PendingToolCall): Promise<string> {
    const tool = this.toolsByName.get(call.name);
    return this.callbacks.withEvent(
      CBEventType.FUNCTION_CALL,
      { functionCall: call.input, tool: tool?.metadata },
      async () => {
        if (!tool) {
          this.logger.warn(`Model called unknown tool ${call.name}`);
          return `Error: there is no tool named ${call.name}.`;
        }
        if (this.options.verbose) {
          this.logger.debug(`Calling ${call.name} with: ${call.input}`);
        }
        const response = await tool.call(call.input);
        if (this.options.verbose) {
          this.logger.debug(`${call.name} returned: ${response.response}`);
        }
        return response.response;
      },
      functionOutput => ({ functionOutput }),
    );
  }
}
