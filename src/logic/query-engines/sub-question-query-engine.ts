import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { NodeWithScore } from '../documents/types';
import { CompletionModel } from '../gemini/types';
import { SUB_QUESTION_PROMPT } from './prompts';
import { ResponseSynthesizer } from './response-synthesizer';
import { QueryEngine, QueryEngineTool, QueryResponse, SubQuestion, SubQuestionAnswerPair, ToolMetadata } from './types';

const subQuestionListSchema = z.object({
  items: z.array(
    z.object({
      sub_question: z.string().min(1),
      tool_name: z.string().min(1),
    }),
  ),
});

/** Asks the model to split a question into sub questions routed to the given tools. */
export class SubQuestionGenerator {
  private readonly logger = new Logger(SubQuestionGenerator.name);

  constructor(private readonly llm: CompletionModel, private readonly callbacks: CallbackManager) {}

  async generate(tools: ToolMetadata[], query: string): Promise<SubQuestion[]> {
    if (tools.length === 0) {
      return [];
    }
    const toolsJson = JSON.stringify(
      Object.fromEntries(tools.map(tool => [tool.name, { description: tool.description }])),
      null,
      2,
    );
    const prompt = SUB_QUESTION_PROMPT(toolsJson, query);
    const raw = await this.callbacks.withEvent(
      CBEventType.LLM,
      { queryStr: prompt },
      () => this.llm.complete(prompt, { temperature: 0 }),
      text => ({ response: text }),
    );
    return this.parse(raw, new Set(tools.map(tool => tool.name)));
  }

  parse(raw: string, toolNames: ReadonlySet<string>): SubQuestion[] {
    const cleaned = raw.trim().replace(/^```(?:json)?\s*|\s*```$/g, '');
    let json: unknown;
    try {
      json = JSON.parse(cleaned);
    } catch (error) {
      this.logger.warn(`Sub question output is not JSON, answering without sub questions: ${String(error)}`);
      return [];
    }
    const parsed = subQuestionListSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Sub question output has an unexpected shape: ${parsed.error.message}`);
      return [];
    }
    return parsed.data.items
      .filter(item => {
        if (!toolNames.has(item.tool_name)) {
          this.logger.warn(`Dropping sub question routed to unknown tool "${item.tool_name}"`);
          return false;
        }
        return true;
      })
      .map(item => ({ subQuestion: item.sub_question, toolName: item.tool_name }));
  }
}

/**
 * Decomposes a question into per-tool sub questions, answers them
 * concurrently and synthesizes a final answer. The response's source nodes
 * are the sub answers followed by every source the sub answers cited.
 */
export class SubQuestionQueryEngine implements QueryEngine {
  private readonly logger = new Logger(SubQuestionQueryEngine.name);
  private readonly toolsByName: Map<string, QueryEngineTool>;

  constructor(
    private readonly tools: QueryEngineTool[],
    private readonly questionGenerator: SubQuestionGenerator,
    private readonly synthesizer: ResponseSynthesizer,
    private readonly callbacks: CallbackManager,
    private readonly verbose = false,
  ) {
    this.toolsByName = new Map(tools.map(tool => [tool.name, tool]));
  }

  async query(queryStr: string): Promise<QueryResponse> {
    return this.callbacks.withEvent(
      CBEventType.QUERY,
      { queryStr },
      async () => {
        const subQuestions = await this.questionGenerator.generate(
          this.tools.map(tool => tool.metadata),
          queryStr,
        );
        if (this.verbose) {
          this.logger.debug(`Generated ${subQuestions.length} sub questions for "${queryStr}"`);
        }

        const pairs = await Promise.all(subQuestions.map(subQuestion => this.answerSubQuestion(subQuestion)));
        const answered = pairs.filter((pair): pair is SubQuestionAnswerPair => pair !== null);

        const qaNodes: NodeWithScore[] = answered.map(pair => ({
          node: {
            id: uuidv4(),
            text: `Sub question: ${pair.subQ.subQuestion}\nResponse: ${pair.answer ?? ''}`,
            metadata: {},
          },
        }));
        const sources = answered.flatMap(pair => pair.sources);
        const response = await this.synthesizer.synthesize(queryStr, qaNodes, sources);
        return { ...response, metadata: { subQuestionAnswers: answered } };
      },
      response => ({ response }),
    );
  }

  private async answerSubQuestion(subQuestion: SubQuestion): Promise<SubQuestionAnswerPair | null> {
    const tool = this.toolsByName.get(subQuestion.toolName);
    if (!tool) {
      return null;
    }
    try {
      return await this.callbacks.withEvent(
        CBEventType.SUB_QUESTION,
        { subQuestion: { subQ: subQuestion, answer: null, sources: [] } },
        async () => {
          const response = await tool.call(subQuestion.subQuestion);
          if (this.verbose) {
            this.logger.debug(`[${subQuestion.toolName}] Q: ${subQuestion.subQuestion} A: ${response.response}`);
          }
          const pair: SubQuestionAnswerPair = {
            subQ: subQuestion,
            answer: response.response,
            sources: response.sourceNodes,
          };
          return pair;
        },
        pair => ({ subQuestion: pair }),
      );
    } catch (error) {
      this.logger.warn(
        `Sub question "${subQuestion.subQuestion}" on ${subQuestion.toolName} failed and is skipped`,
        error instanceof Error ? error.stack : String(error),
      );
      return null;
    }
  }
}
