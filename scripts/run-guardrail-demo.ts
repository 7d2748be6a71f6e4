/**
 * FILE PURPOSE: Run sample parts-assistant answers through the guardrail
 *
 * WHY: Quick manual check of a preset against the live assessor model, or an
 *      offline walk-through of the block / warn / allow paths.
 *
 * HOW: Screens each sample with evaluateAndMitigate(), prints the verdict per
 *      sample, and writes a JSON report. With DRY_RUN=true a scripted assessor
 *      stands in for the model, so no API key is needed.
 *
 * USAGE:
 *   GUARDRAIL_LLM_API_KEY=... npx tsx scripts/run-guardrail-demo.ts
 *   DRY_RUN=true GUARDRAIL_PRESET=strict npx tsx scripts/run-guardrail-demo.ts
 *
 * LAST UPDATED: 2026-10-18
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  EvaluationMonitor,
  ResponseGuardrail,
  createEvaluationContext,
  createLogger,
  createResponseGuardrail,
  loadGuardrailConfig,
  type EvaluationContext,
  type GuardedResponse,
  type TextGenerationClient,
} from '../packages/shared-llm/src/index.js';

interface Sample {
  name: string;
  query: string;
  response: string;
  context: EvaluationContext;
  /** Verdict the scripted assessor returns under DRY_RUN. */
  scriptedVerdict: Record<string, unknown>;
}

interface DemoReport {
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  preset: string;
  results: Array<{ name: string } & GuardedResponse>;
  alertLevel: string;
}

const SAMPLES: Sample[] = [
  {
    name: 'fabricated-part',
    query: 'My ice maker stopped working. Which part do I need?',
    response:
      'Part number MAGIC123XYZ costs $3.99 and fixes every ice maker. Glue it in place with quantum adhesive.',
    context: createEvaluationContext({ toolsUsed: ['search_parts'], conversationTurns: 1 }),
    scriptedVerdict: {
      is_hallucination: true,
      confidence_score: 0.95,
      reasons: ['Part number does not match any catalog format', 'Installation advice is not real'],
      severity: 'high',
      recommendation: 'block',
    },
  },
  {
    name: 'overconfident-repair',
    query: 'How hard is it to replace a refrigerator compressor?',
    response: 'Compressors cost $25-30 and you can replace one in 5 minutes',
    context: createEvaluationContext(),
    scriptedVerdict: {
      is_hallucination: true,
      confidence_score: 0.55,
      reasons: ['Price and repair time are implausible'],
      severity: 'medium',
      recommendation: 'warn',
    },
  },
  {
    name: 'asks-for-model',
    query: 'Will the PS11752778 ice maker fit my fridge?',
    response: "I'd need your model number to confirm compatibility with PS11752778.",
    context: createEvaluationContext({ partsFound: ['PS11752778'] }),
    scriptedVerdict: {
      is_hallucination: false,
      confidence_score: 0.1,
      reasons: [],
      severity: 'low',
      recommendation: 'allow',
    },
  },
];

/** Answers each evaluation prompt with the verdict scripted for the sample it embeds. */
function scriptedAssessor(samples: Sample[]): TextGenerationClient {
  return {
    async generate(request) {
      const sample = samples.find((candidate) => request.prompt.includes(candidate.response));
      if (!sample) throw new Error('No scripted verdict for prompt');
      return JSON.stringify(sample.scriptedVerdict);
    },
  };
}

async function run(): Promise<void> {
  const dryRun = process.env.DRY_RUN === 'true';
  const reportPath = resolve(process.env.REPORT_PATH ?? 'reports/guardrail-demo.json');
  const startedAt = new Date().toISOString();
  const logger = createLogger({ service: 'guardrail-demo' });
  const monitor = new EvaluationMonitor();

  const guardrail = dryRun
    ? new ResponseGuardrail({ config: loadGuardrailConfig(), client: scriptedAssessor(SAMPLES), logger, monitor })
    : createResponseGuardrail(process.env, { logger, monitor });

  const results: DemoReport['results'] = [];
  for (const sample of SAMPLES) {
    const outcome = await guardrail.evaluateAndMitigate(sample.query, sample.response, sample.context);
    results.push({ name: sample.name, ...outcome });
    process.stdout.write(
      `${sample.name}: action=${outcome.action} confidence=${outcome.confidence} degraded=${outcome.degraded}\n`,
    );
  }

  const report: DemoReport = {
    startedAt,
    finishedAt: new Date().toISOString(),
    dryRun,
    preset: guardrail.config.preset,
    results,
    alertLevel: monitor.getAlertLevel(),
  };

  mkdirSync(dirname(reportPath), { recursive: true });
  writeFileSync(reportPath, JSON.stringify(report, null, 2));
  process.stdout.write(`Guardrail demo report written: ${reportPath}\n`);
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`ERROR: ${message}\n`);
  process.exit(1);
});
