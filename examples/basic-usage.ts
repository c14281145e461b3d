/**
 * LLM Workflow Patterns - Basic Usage Examples
 *
 * Runs each workflow pattern against whichever providers have API keys.
 * Run with: npm run example
 */

import { z } from 'zod';
import { Workflows, estimateCost, getCheapestModel } from '../src';

const QUARTERLY_REPORT = `
Q3 Performance Summary:
Our customer satisfaction score rose to 92 points this quarter.
Revenue grew by 45% compared to last year.
Market share is now at 23% in our primary market.
Customer churn decreased to 5% from 8%.
New user acquisition cost is $43 per user.
Product adoption rate increased to 78%.
Employee satisfaction is at 87 points.
Operating margin improved to 34%.
`;

const SUPPORT_ROUTES = {
  billing: `You are a billing support specialist. Follow these guidelines:
1. Always start with "Billing Support Response:"
2. First acknowledge the specific billing issue
3. Explain any charges or discrepancies clearly
4. List concrete next steps with timeline
5. End with payment options if relevant`,

  technical: `You are a technical support engineer. Follow these guidelines:
1. Always start with "Technical Support Response:"
2. List exact steps to resolve the issue
3. Include system requirements if relevant
4. Provide workarounds for common problems
5. End with escalation path if needed`,

  account: `You are an account security specialist. Follow these guidelines:
1. Always start with "Account Support Response:"
2. Prioritize account security and verification
3. Provide clear steps for account recovery/changes
4. Include security tips and warnings
5. Set clear expectations for resolution time`,
};

async function main() {
  console.log('=== LLM Workflow Pattern Examples ===\n');

  const workflows = new Workflows();
  console.log('Available providers:', workflows.getAvailableProviders());

  if (!workflows.isReady()) {
    console.log('No providers configured. Set ANTHROPIC_API_KEY, OPENAI_API_KEY, or GOOGLE_AI_API_KEY');
    return;
  }

  // ----------------------------------------------------------------------------
  // Example 1: Prompt Chaining
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 1: Prompt Chaining ---');

  const chained = await workflows.chain(QUARTERLY_REPORT, [
    'Extract only the numerical values and their associated metrics from the text. Format each as "value: metric" on a new line.',
    'Convert all numerical values to percentages where possible. If not a percentage or points, convert to decimal. Keep one number per line.',
    'Sort all lines in descending order by numerical value. Keep the format "value: metric" on each line.',
    'Format the sorted data as a markdown table with columns: | Metric | Value |',
  ]);

  console.log(chained.output);
  console.log(`  Steps: ${chained.steps.length}, cost: $${chained.usage.estimatedCost.toFixed(4)}`);

  // ----------------------------------------------------------------------------
  // Example 2: Parallelization
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 2: Parallelization ---');

  const stakeholders = await workflows.parallel(
    'Analyze how market changes will impact this stakeholder group. Provide specific impacts and recommended actions. Format with clear sections and priorities.',
    [
      'Customers: price sensitive, want better tech, environmental concerns',
      'Employees: job security worries, need new skills, want clear direction',
      'Investors: expect growth, want cost control, risk concerns',
      'Suppliers: capacity constraints, price pressures, tech transitions',
    ],
    { workers: 4 }
  );

  stakeholders.outputs.forEach((output, i) => {
    console.log(`\n[Stakeholder ${i + 1}]\n${output.substring(0, 200)}...`);
  });
  console.log(`  Total time: ${stakeholders.totalMs}ms`);

  // ----------------------------------------------------------------------------
  // Example 3: Routing
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 3: Routing ---');

  const tickets = [
    `Subject: Can't access my account
Message: Hi, I've been trying to log in for the past hour but keep getting an 'invalid password' error.
I'm sure I'm using the right password. Can you help me regain access?`,
    `Subject: Unexpected charge on my card
Message: Hello, I just noticed a charge of $49.99 on my credit card from your company, but I thought
I was on the $29.99 plan. Can you explain this charge and adjust it if it's a mistake?`,
    `Subject: How to export data?
Message: I need to export all my project data to Excel. I've looked through the docs but can't
figure out how to do a bulk export. Is this possible?`,
  ];

  for (const ticket of tickets) {
    const routed = await workflows.route(ticket, SUPPORT_ROUTES);
    console.log(`\n  Route: ${routed.decision.selection}`);
    console.log(`  Reasoning: ${routed.decision.reasoning}`);
    console.log(`  Answer preview: ${routed.output.substring(0, 150)}...`);
  }

  console.log('\nRouter stats:', workflows.getRouterStats());

  // ----------------------------------------------------------------------------
  // Example 4: Orchestrator-Workers
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 4: Orchestrator-Workers ---');

  const orchestrated = await workflows.orchestrate(
    'Write a product description for a new eco-friendly water bottle',
    {
      target_audience: 'environmentally conscious millennials',
      key_features: 'plastic-free, insulated, lifetime warranty',
    }
  );

  console.log(`Analysis: ${orchestrated.analysis}`);
  for (const result of orchestrated.workerResults) {
    console.log(`\n[${result.task.type}] ${result.task.description}\n${result.output}`);
  }

  // ----------------------------------------------------------------------------
  // Example 5: Structured Output
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 5: Structured Output ---');

  const actorFilms = z.object({
    actor: z.string(),
    movies: z.array(z.string()),
  });

  const { value } = await workflows.structured(
    'Generate the filmography of 5 movies for Tom Hanks.',
    actorFilms,
    { format: '{ "actor": string, "movies": string[] }' }
  );
  console.log(`${value.actor}: ${value.movies.join(', ')}`);

  // ----------------------------------------------------------------------------
  // Example 6: Model Registry
  // ----------------------------------------------------------------------------
  console.log('\n--- Example 6: Model Registry ---');

  const cost = estimateCost('claude-sonnet-4', 2000, 500);
  console.log(`Estimated cost for 2K input + 500 output on Sonnet: $${cost.toFixed(4)}`);

  const cheapest = getCheapestModel({ minContextWindow: 100000 });
  if (cheapest) {
    console.log(`Cheapest model with 100K+ context: ${cheapest.id}`);
  }

  console.log('\n=== Examples Complete ===');
}

main().catch(console.error);
