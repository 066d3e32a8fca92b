import { GenAIClient } from '../src/llm/llm-base';
import { logger } from '../src/observability/logger';

const RULE = '='.repeat(50);

function banner(title: string) {
  console.log(RULE);
  console.log(title);
  console.log(RULE);
}

async function main() {
  const genai = new GenAIClient();

  banner('Example 1: Text Generation');
  const prompt = 'Explain container image layering in simple terms';
  console.log(`Prompt: ${prompt}`);
  console.log(`Response: ${await genai.generateText(prompt)}\n`);

  banner('Example 2: Multi-turn Conversation');
  genai.startConversation();
  const messages = [
    'What are the benefits of multi-stage container builds?',
    'Can you explain build caching in detail?',
    'What about running containers as a non-root user?'
  ];
  for (const msg of messages) {
    console.log(`User: ${msg}`);
    console.log(`Assistant: ${await genai.sendConversationTurn(msg)}\n`);
  }

  banner('Example 3: Content Analysis');
  const content = 'The new build pipeline is fantastic. Images are half the size and deploys are much faster.';
  const analysis = await genai.analyzeContent(content, 'sentiment');
  console.log(`Analysis Type: ${analysis.analysisType}`);
  console.log(`Result: ${analysis.result}\n`);
}

main().catch((err) => {
  logger.error('demo failed', err);
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
