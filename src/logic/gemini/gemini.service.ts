import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, FunctionDeclaration, GoogleGenAI, Type } from '@google/genai';
import { Environment } from '../../config/configuration';
import {
    AgentTurn,
    ChatModel,
    CompletionOptions,
    EmbeddingModel,
    ModelStreamChunk,
    StreamChatRequest,
    ToolDeclaration,
} from './types';

const EMBED_BATCH_SIZE = 100;

@Injectable()
export class GeminiService implements ChatModel, EmbeddingModel {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly chatModel: string;
    private readonly embedModel: string;

    constructor(private readonly configService: ConfigService<Environment, true>) {
        this.genAI = new GoogleGenAI({ apiKey: this.configService.get('GEMINI_API_KEY', { infer: true }) });
        this.chatModel = this.configService.get('GEMINI_CHAT_MODEL', { infer: true });
        this.embedModel = this.configService.get('GEMINI_EMBED_MODEL', { infer: true });
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let start = 0; start < texts.length; start += EMBED_BATCH_SIZE) {
            const batch = texts.slice(start, start + EMBED_BATCH_SIZE);
            const result = await this.genAI.models.embedContent({ model: this.embedModel, contents: batch });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== batch.length) {
                throw new Error(`Expected ${batch.length} embeddings from ${this.embedModel}, got ${embeddings.length}`);
            }
            vectors.push(...embeddings);
        }
        return vectors;
    }

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
        const result = await this.genAI.models.generateContent({
            model: this.chatModel,
            contents: [{ role: 'user', parts: [{ text: prompt }] }],
            config: {
                temperature: options.temperature ?? 0,
                systemInstruction: options.system,
            },
        });
        return result.text ?? '';
    }

    async *streamChat(request: StreamChatRequest): AsyncGenerator<ModelStreamChunk> {
        const stream = await this.genAI.models.generateContentStream({
            model: this.chatModel,
            contents: toContents(request.turns),
            config: {
                temperature: request.temperature ?? 0,
                systemInstruction: request.system,
                tools: request.tools.length > 0
                    ? [{ functionDeclarations: request.tools.map(toFunctionDeclaration) }]
                    : undefined,
            },
        });

        for await (const chunk of stream) {
            const parts = chunk.candidates?.[0]?.content?.parts ?? [];
            for (const part of parts) {
                if (part.functionCall?.name) {
                    yield { kind: 'tool_call', name: part.functionCall.name, input: readToolInput(part.functionCall.args) };
                } else if (part.text && !part.thought) {
                    yield { kind: 'text', text: part.text };
                }
            }
        }
        this.logger.debug(`Finished streaming ${this.chatModel} response`);
    }
}

function toFunctionDeclaration(tool: ToolDeclaration): FunctionDeclaration {
    return {
        name: tool.name,
        description: tool.description,
        parameters: {
            type: Type.OBJECT,
            properties: {
                input: { type: Type.STRING, description: 'A complete, standalone question for the tool.' },
            },
            required: ['input'],
        },
    };
}

// Gemini has no assistant or tool roles: assistant text and calls go out as
// 'model' turns, tool results as 'user' turns carrying a functionResponse.
function toContents(turns: AgentTurn[]): Content[] {
    return turns.map((turn): Content => {
        switch (turn.kind) {
            case 'message':
                return { role: turn.role === 'assistant' ? 'model' : 'user', parts: [{ text: turn.content }] };
            case 'tool_call':
                return { role: 'model', parts: [{ functionCall: { name: turn.name, args: { input: turn.input } } }] };
            case 'tool_result':
                return { role: 'user', parts: [{ functionResponse: { name: turn.name, response: { output: turn.output } } }] };
        }
    });
}

function readToolInput(args: Record<string, unknown> | undefined): string {
    const input = args?.input;
    return typeof input === 'string' ? input : JSON.stringify(args ?? {});
}
