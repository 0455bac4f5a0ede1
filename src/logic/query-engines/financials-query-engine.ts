import { v4 as uuidv4 } from 'uuid';
import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { SecDocumentMetadata } from '../documents/document-metadata';
import { DB_DOC_ID_KEY } from '../documents/types';
import { FinancialStatements, FinancialStatementsSource, formatStatements } from '../financials/financials.service';
import { CompletionModel } from '../gemini/types';
import { FINANCIALS_QA_PROMPT } from './prompts';
import { QueryEngine, QueryResponse } from './types';

/** Answers quantitative questions about one SEC filing from its reported statements. */
export class FinancialsQueryEngine implements QueryEngine {
  private statements: Promise<FinancialStatements[]> | null = null;

  constructor(
    private readonly documentId: string,
    private readonly title: string,
    private readonly metadata: SecDocumentMetadata,
    private readonly financialsService: FinancialStatementsSource,
    private readonly llm: CompletionModel,
    private readonly callbacks: CallbackManager,
  ) {}

  async query(queryStr: string): Promise<QueryResponse> {
    return this.callbacks.withEvent(
      CBEventType.QUERY,
      { queryStr },
      async () => {
        const context = formatStatements(await this.loadStatements());
        if (!context) {
          return {
            response: `No structured financial data is available for ${this.title}.`,
            sourceNodes: [],
          };
        }
        const prompt = FINANCIALS_QA_PROMPT(context, queryStr, this.title);
        const answer = await this.callbacks.withEvent(
          CBEventType.LLM,
          { queryStr: prompt },
          () => this.llm.complete(prompt, { temperature: 0 }),
          text => ({ response: text }),
        );
        return {
          response: answer.trim(),
          sourceNodes: [{ node: { id: uuidv4(), text: context, metadata: { [DB_DOC_ID_KEY]: this.documentId } } }],
        };
      },
      response => ({ response }),
    );
  }

  private loadStatements(): Promise<FinancialStatements[]> {
    if (!this.statements) {
      const pending = this.financialsService.getStatementsForFiling(this.metadata);
      // a failed request is retried on the next question
      pending.catch(() => {
        this.statements = null;
      });
      this.statements = pending;
    }
    return this.statements;
  }
}
