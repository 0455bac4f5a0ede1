import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';
import { CallbackManager } from '../callbacks/callback-manager';
import { buildDescriptionForDocument, buildDocTitles, buildTitleForDocument, readSecMetadata } from '../documents/document-metadata';
import { DB_DOC_ID_KEY, DocumentRef } from '../documents/types';
import { FinancialsService } from '../financials/financials.service';
import { GeminiService } from '../gemini/gemini.service';
import { VectorIndex } from '../index-store/vector-index';
import { CitationQueryEngine, CITATION_CHUNK_SIZE } from '../query-engines/citation-query-engine';
import { FinancialsQueryEngine } from '../query-engines/financials-query-engine';
import { ResponseSynthesizer } from '../query-engines/response-synthesizer';
import { SubQuestionGenerator, SubQuestionQueryEngine } from '../query-engines/sub-question-query-engine';
import { QueryEngineTool } from '../query-engines/types';

export const QUALITATIVE_TOOL_NAME = 'qualitative_question_engine';
export const QUANTITATIVE_TOOL_NAME = 'quantitative_question_engine';

export const QUALITATIVE_TOOL_DESCRIPTION = `A query engine that can answer qualitative questions about a set of SEC financial documents that the user pre-selected for the conversation.
Any questions about company-related headwinds, tailwinds, risks, sentiments, or administrative information should be asked here.`;

export const QUANTITATIVE_TOOL_DESCRIPTION = `A query engine that can answer quantitative questions about a set of SEC financial documents that the user pre-selected for the conversation.
Any questions about company-related financials or other metrics should be asked here.`;

export const CITATION_SIMILARITY_TOP_K = 3;

export interface ComposedTools {
  vectorTools: QueryEngineTool[];
  financialsTools: QueryEngineTool[];
  /** Always exactly the qualitative and quantitative engines, in that order. */
  topLevelTools: QueryEngineTool[];
}

@Injectable()
export class ToolComposerService {
  private readonly logger = new Logger(ToolComposerService.name);

  constructor(
    private readonly geminiService: GeminiService,
    private readonly financialsService: FinancialsService,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  buildTools(
    docIdToIndex: ReadonlyMap<string, VectorIndex>,
    documents: DocumentRef[],
    callbacks: CallbackManager,
  ): ComposedTools {
    const verbose = this.configService.get('VERBOSE', { infer: true });
    const documentsById = new Map(documents.map(document => [document.id, document]));

    const vectorTools: QueryEngineTool[] = [];
    for (const [docId, index] of docIdToIndex) {
      const document = documentsById.get(docId);
      if (!document) {
        this.logger.warn(`Index ${docId} has no matching conversation document, skipping`);
        continue;
      }
      const engine = new CitationQueryEngine(
        index.asRetriever({
          similarityTopK: CITATION_SIMILARITY_TOP_K,
          filters: { [DB_DOC_ID_KEY]: docId },
        }),
        this.geminiService,
        callbacks,
        CITATION_CHUNK_SIZE,
      );
      vectorTools.push(new QueryEngineTool(engine, { name: docId, description: buildDescriptionForDocument(document) }));
    }

    const financialsTools: QueryEngineTool[] = [];
    for (const document of documents) {
      const sec = readSecMetadata(document);
      if (!sec) {
        continue;
      }
      const engine = new FinancialsQueryEngine(
        document.id,
        buildTitleForDocument(document),
        sec,
        this.financialsService,
        this.geminiService,
        callbacks,
      );
      financialsTools.push(
        new QueryEngineTool(engine, { name: document.id, description: buildDescriptionForDocument(document) }),
      );
    }

    const synthesizer = new ResponseSynthesizer(this.geminiService, callbacks, buildDocTitles(documents));
    const questionGenerator = new SubQuestionGenerator(this.geminiService, callbacks);

    const qualitativeEngine = new SubQuestionQueryEngine(vectorTools, questionGenerator, synthesizer, callbacks, verbose);
    const quantitativeEngine = new SubQuestionQueryEngine(financialsTools, questionGenerator, synthesizer, callbacks, verbose);

    return {
      vectorTools,
      financialsTools,
      topLevelTools: [
        new QueryEngineTool(qualitativeEngine, { name: QUALITATIVE_TOOL_NAME, description: QUALITATIVE_TOOL_DESCRIPTION }),
        new QueryEngineTool(quantitativeEngine, { name: QUANTITATIVE_TOOL_NAME, description: QUANTITATIVE_TOOL_DESCRIPTION }),
      ],
    };
  }
}
