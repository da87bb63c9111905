/**
 * @fileoverview Example: Grounded Questions Over a Small Statute Corpus
 *
 * This example demonstrates how to:
 * 1. Wire the default model providers from environment variables
 * 2. Index pre-chunked documents
 * 3. Ask a question and a vague follow-up in one conversation
 * 4. Inspect citations and per-stage reports
 *
 * Requires ANTHROPIC_API_KEY and OPENAI_API_KEY.
 * Run with: npx tsx examples/legal_qa_example.ts
 */

import {
  LegalRagPipeline,
  SqliteConversationStore,
  createDefaultProviders,
  getDefaultKnowledgeGraph,
  loadPipelineConfigFromEnv,
  type AnswerResult,
} from '../src/index.js';

function printResult(label: string, result: AnswerResult): void {
  console.log(`\n=== ${label} (${result.outcome}) ===`);
  if (result.rewrittenQuery) {
    console.log(`Searched for: ${result.rewrittenQuery}`);
  }
  console.log(result.answerText);
  for (const citation of result.citations) {
    console.log(`  [${citation.citationIndex}] ${citation.filename}, page ${citation.pageNumber} (${citation.relevanceScore})`);
  }
  for (const stage of result.stages) {
    const issues = stage.issues.map((issue) => issue.message).join('; ');
    console.log(`  ${stage.stage}: ${stage.status} in ${stage.durationMs}ms${issues ? ` - ${issues}` : ''}`);
  }
}

async function main(): Promise<void> {
  const graph = getDefaultKnowledgeGraph();
  const config = loadPipelineConfigFromEnv();
  const pipeline = new LegalRagPipeline({
    providers: createDefaultProviders(graph),
    config,
    knowledgeGraph: graph,
    conversationStore: new SqliteConversationStore({
      path: ':memory:',
      maxTurns: config.maxConversationTurns,
      ttlMs: config.conversationTtlMs,
    }),
  });

  try {
    await pipeline.indexDocument({
      documentId: 'constitution-part-iii',
      filename: 'constitution_part_iii.pdf',
      chunks: [
        {
          pageNumber: 12,
          text: 'No person shall be deprived of his life or personal liberty except according to procedure established by law.',
        },
        {
          pageNumber: 13,
          text:
            'Every person who is arrested and detained in custody shall be produced before the nearest magistrate ' +
            'within a period of twenty-four hours of such arrest.',
        },
      ],
    });

    const first = await pipeline.answer('What protects personal liberty?');
    printResult('Question', first);

    const followUp = await pipeline.answer('Tell me more about it', { conversationId: first.conversationId });
    printResult('Follow-up', followUp);

    console.log('\nStats:', await pipeline.stats());
  } finally {
    pipeline.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
