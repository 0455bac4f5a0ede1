import { CallbackEvent, CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { NodeWithScore } from '../documents/types';
import { FakeGemini } from '../testing/fakes';
import { ResponseSynthesizer } from './response-synthesizer';
import { SubQuestionGenerator, SubQuestionQueryEngine } from './sub-question-query-engine';
import { QueryEngineTool } from './types';

const source = (docId: string): NodeWithScore => ({
  node: { id: `${docId}-src`, text: `Excerpt from ${docId}`, metadata: { db_document_id: docId, page_label: '1' } },
});

const toolFor = (docId: string, fail = false) =>
  new QueryEngineTool(
    {
      query: async (question: string) => {
        if (fail) {
          throw new Error(`${docId} unavailable`);
        }
        return { response: `${docId} says: ${question}`, sourceNodes: [source(docId)] };
      },
    },
    { name: docId, description: `Filing ${docId}` },
  );

describe('SubQuestionQueryEngine', () => {
  let gemini: FakeGemini;
  let events: CallbackEvent[];
  let callbacks: CallbackManager;

  const engineOver = (tools: QueryEngineTool[]) =>
    new SubQuestionQueryEngine(
      tools,
      new SubQuestionGenerator(gemini, callbacks),
      new ResponseSynthesizer(gemini, callbacks, '- Doc A\n- Doc B'),
      callbacks,
    );

  beforeEach(() => {
    gemini = new FakeGemini();
    gemini.completions = [
      {
        when: prompt => prompt.includes('Return JSON only'),
        text: '```json\n{"items":[{"sub_question":"Revenue of A?","tool_name":"doc-a"},{"sub_question":"Revenue of B?","tool_name":"doc-b"},{"sub_question":"Revenue of C?","tool_name":"doc-c"}]}\n```',
      },
      { when: prompt => prompt.includes('Context information is below.'), text: 'A grew faster than B.' },
    ];
    events = [];
    callbacks = new CallbackManager([{ onEvent: event => events.push(event) }]);
  });

  it('answers each routed sub question and synthesizes the result', async () => {
    const response = await engineOver([toolFor('doc-a'), toolFor('doc-b')]).query('Compare revenue');

    expect(response.response).toBe('A grew faster than B.');
    expect(response.sourceNodes.map(({ node }) => node.text)).toEqual([
      'Sub question: Revenue of A?\nResponse: doc-a says: Revenue of A?',
      'Sub question: Revenue of B?\nResponse: doc-b says: Revenue of B?',
      'Excerpt from doc-a',
      'Excerpt from doc-b',
    ]);
    const qaPrompt = gemini.prompts[1];
    expect(qaPrompt).toContain('- Doc A\n- Doc B');
  });

  it('reports every sub question with its answer on the end event', async () => {
    await engineOver([toolFor('doc-a'), toolFor('doc-b')]).query('Compare revenue');

    const ends = events.filter(event => event.type === CBEventType.SUB_QUESTION && event.phase === 'end');
    expect(ends.map(event => (event.payload.kind === 'sub_question' ? event.payload.pair.answer : null))).toEqual([
      'doc-a says: Revenue of A?',
      'doc-b says: Revenue of B?',
    ]);
  });

  it('skips a sub question whose tool fails', async () => {
    const response = await engineOver([toolFor('doc-a'), toolFor('doc-b', true)]).query('Compare revenue');

    expect(response.sourceNodes.map(({ node }) => node.text)).toEqual([
      'Sub question: Revenue of A?\nResponse: doc-a says: Revenue of A?',
      'Excerpt from doc-a',
    ]);
  });

  it('answers with an empty response when there are no tools', async () => {
    await expect(engineOver([]).query('Compare revenue')).resolves.toEqual({
      response: 'Empty Response',
      sourceNodes: [],
      metadata: { subQuestionAnswers: [] },
    });
    expect(gemini.prompts).toEqual([]);
  });
});

describe('SubQuestionGenerator.parse', () => {
  const generator = new SubQuestionGenerator(new FakeGemini(), new CallbackManager());

  it('drops sub questions routed to unknown tools', () => {
    expect(
      generator.parse('{"items":[{"sub_question":"Q1","tool_name":"doc-a"},{"sub_question":"Q2","tool_name":"nope"}]}', new Set(['doc-a'])),
    ).toEqual([{ subQuestion: 'Q1', toolName: 'doc-a' }]);
  });

  it('returns no sub questions for output that is not JSON', () => {
    expect(generator.parse('I cannot help with that.', new Set(['doc-a']))).toEqual([]);
  });

  it('returns no sub questions for JSON of the wrong shape', () => {
    expect(generator.parse('{"questions":["Q1"]}', new Set(['doc-a']))).toEqual([]);
  });
});
