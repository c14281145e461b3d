/**
 * Streams one answer to stdout as it is generated.
 * Run with: npm run example:stream
 */

import { Workflows } from '../src';

async function main() {
  const workflows = new Workflows();

  if (!workflows.isReady()) {
    console.log('No providers configured. Set ANTHROPIC_API_KEY, OPENAI_API_KEY, or GOOGLE_AI_API_KEY');
    return;
  }

  const prompt = process.argv.slice(2).join(' ') || 'Tell me a short story about a lighthouse keeper.';

  for await (const chunk of workflows.stream(prompt, 'You are a concise storyteller.')) {
    process.stdout.write(chunk);
  }
  process.stdout.write('\n');
}

main().catch(console.error);
