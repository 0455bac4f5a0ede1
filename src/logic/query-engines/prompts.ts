export const CITATION_QA_PROMPT = (context: string, query: string) => `Please provide an answer based solely on the provided sources.
When referencing information from a source, cite the appropriate source(s) using their corresponding numbers.
Every answer should include at least one source citation.
Only cite a source when you are explicitly referencing it.
If none of the sources are helpful, you should indicate that.
For example:
Source 1:
The sky is red in the evening and blue in the morning.
Source 2:
Water is wet when the sky is red.
Query: When is water wet?
Answer: Water will be wet when the sky is red [2], which occurs in the evening [1].
Now it's your turn. Below are several numbered sources of information:
------
${context}
------
Query: ${query}
Answer: `;

export const QA_PROMPT = (context: string, query: string, docTitles: string) => `Context information is below.
---------------------
${context}
---------------------
The user has selected the following documents for this conversation:
${docTitles}

Given the context information and not prior knowledge, answer the query.
Prefer specific figures and quote the document they come from.
If the context does not contain the answer, say so and relay anything in it that is still relevant.
Query: ${query}
Answer: `;

export const REFINE_PROMPT = (existingAnswer: string, context: string, query: string) => `The original query is as follows: ${query}
We have provided an existing answer: ${existingAnswer}
We have the opportunity to refine the existing answer (only if needed) with some more context below.
------------
${context}
------------
Given the new context, refine the original answer to better answer the query.
If the context isn't useful, return the original answer.
Refined Answer: `;

export const SUB_QUESTION_PROMPT = (toolsJson: string, query: string) => `You have access to the following tools, each described by a name and what it knows about:
${toolsJson}

Break the user question below into the smallest set of sub questions that together answer it.
Every sub question must be answerable by exactly one of the tools and must name that tool in "tool_name".
Use the tool names exactly as given. Ask one sub question per tool at most, unless the question compares several periods of the same document.

Return JSON only, in the shape:
{ "items": [ { "sub_question": string, "tool_name": string } ] }

User question: ${query}`;

export const FINANCIALS_QA_PROMPT = (statements: string, query: string, title: string) => `Below are the structured financial statements reported in ${title}.
Every line reads "<statement>.<line item> (<label>): <value> <unit>".
------
${statements}
------
Answer the query using only these figures. Compute ratios or differences when asked and show the figures you used.
If the statements do not contain what is needed, say so.
Query: ${query}
Answer: `;
