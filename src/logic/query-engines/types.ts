import { NodeWithScore } from '../documents/types';

export interface QueryResponse {
  response: string;
  sourceNodes: NodeWithScore[];
  metadata?: Record<string, unknown>;
}

export interface QueryEngine {
  query(queryStr: string): Promise<QueryResponse>;
}

export interface ToolMetadata {
  name: string;
  description: string;
}

export interface SubQuestion {
  subQuestion: string;
  toolName: string;
}

export interface SubQuestionAnswerPair {
  subQ: SubQuestion;
  answer: string | null;
  sources: NodeWithScore[];
}

/** A query engine the agent (or a sub-question router) can call by name. */
export class QueryEngineTool {
  constructor(readonly queryEngine: QueryEngine, readonly metadata: ToolMetadata) {}

  get name(): string {
    return this.metadata.name;
  }

  async call(input: string): Promise<QueryResponse> {
    return this.queryEngine.query(input);
  }
}
