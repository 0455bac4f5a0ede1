import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { NodeWithScore } from '../documents/types';
import { CompletionModel } from '../gemini/types';
import { QA_PROMPT, REFINE_PROMPT } from './prompts';
import { QueryResponse } from './types';

export const EMPTY_RESPONSE = 'Empty Response';

const MAX_CONTEXT_CHARS = 24000;

/**
 * Compact-and-refine synthesis: node texts are packed into as few prompts as
 * fit, the first batch answers and each following batch refines the answer.
 */
export class ResponseSynthesizer {
  constructor(
    private readonly llm: CompletionModel,
    private readonly callbacks: CallbackManager,
    private readonly docTitles: string,
    private readonly maxContextChars = MAX_CONTEXT_CHARS,
  ) {}

  async synthesize(query: string, nodes: NodeWithScore[], additionalSourceNodes: NodeWithScore[] = []): Promise<QueryResponse> {
    return this.callbacks.withEvent(
      CBEventType.SYNTHESIZE,
      { queryStr: query },
      async () => {
        const sourceNodes = [...nodes, ...additionalSourceNodes];
        if (nodes.length === 0) {
          return { response: EMPTY_RESPONSE, sourceNodes };
        }

        let answer: string | null = null;
        for (const context of this.packContexts(nodes)) {
          const prompt: string = answer === null
            ? QA_PROMPT(context, query, this.docTitles)
            : REFINE_PROMPT(answer, context, query);
          answer = await this.callbacks.withEvent<string>(
            CBEventType.LLM,
            { queryStr: prompt },
            () => this.llm.complete(prompt),
            text => ({ response: text }),
          );
        }
        return { response: answer?.trim() || EMPTY_RESPONSE, sourceNodes };
      },
    );
  }

  private packContexts(nodes: NodeWithScore[]): string[] {
    const contexts: string[] = [];
    let current = '';
    for (const { node } of nodes) {
      const text = node.text.slice(0, this.maxContextChars);
      if (current && current.length + 2 + text.length > this.maxContextChars) {
        contexts.push(current);
        current = text;
      } else {
        current = current ? `${current}\n\n${text}` : text;
      }
    }
    if (current) {
      contexts.push(current);
    }
    return contexts;
  }
}
