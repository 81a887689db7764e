import { bootstrap } from '../src/agent/bootstrap.js';
import { formatTrace } from '../src/agent/pipeline.js';
import { loadConfig } from '../src/config/index.js';

const EXAMPLE_QUESTIONS = [
  'What companies did Elon Musk found?',
  'What is the relationship between Microsoft and OpenAI?',
  'Who leads NVIDIA?',
  'What did Google acquire?',
  'Who supplies hardware to OpenAI?'
];

/**
 * Answer a few sample questions against the bundled knowledge graph
 */
async function demonstrateGraphRag(): Promise<void> {
  console.log('🚀 Initializing Graph RAG question answering...\n');

  const config = loadConfig();
  const { graph, pipeline } = bootstrap(config);

  const stats = graph.getStats();
  console.log(`📊 Graph: ${stats.totalNodes} nodes, ${stats.totalEdges} edges`);
  console.log(`🤖 Live generation: ${pipeline.generationAvailable ? config.model : 'off'}\n`);

  for (const question of EXAMPLE_QUESTIONS) {
    console.log('='.repeat(60));
    console.log(`❓ ${question}`);
    console.log('='.repeat(60));

    const state = await pipeline.run(question);

    if (config.verbose) {
      console.log(formatTrace(state));
      console.log('');
    }

    console.log(`💬 ${state.answer}\n`);
  }
}

demonstrateGraphRag().catch((error: unknown) => {
  console.error('❌ Demo failed:', error);
  process.exitCode = 1;
});
