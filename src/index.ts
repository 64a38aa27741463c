#!/usr/bin/env node
// Alert Triage - CLI entry point
// Usage: alert-triage [--demo] [--limit N]

// Load environment variables from .env file
import 'dotenv/config';

import { env, isClassifierConfigured, logConfiguration } from './env.js';
import { logger } from './utils/logger.js';
import {
  EXIT_CANCELLED,
  EXIT_OK,
  TriageError,
  describeError,
  exitCodeFor,
} from './utils/errors.js';
import { buildTriageConfig, validateTriageConfig, TriageEngine } from './services/triage/index.js';
import { createClassifier } from './services/classifier/index.js';
import { FileAlertSource } from './services/alerts/index.js';
import { JsonlDecisionRecorder, formatSummaryReport } from './services/recorder/index.js';

interface CliArgs {
  demo: boolean;
  limit: number;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { demo: false, limit: env.ALERT_LIMIT };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--demo') {
      args.demo = true;
    } else if (arg === '--limit') {
      const value = parseInt(argv[i + 1] ?? '', 10);
      if (isNaN(value) || value < 0) {
        throw TriageError.configuration(`--limit expects a non-negative integer, got "${argv[i + 1] ?? ''}"`);
      }
      args.limit = value;
      i++;
    } else if (arg === '--help' || arg === '-h') {
      console.log('Usage: alert-triage [--demo] [--limit N]');
      process.exit(EXIT_OK);
    } else {
      throw TriageError.configuration(`Unknown argument "${arg}"`);
    }
  }

  return args;
}

async function main(): Promise<number> {
  console.log('Alert Triage - Automated Alert Triage');
  console.log('='.repeat(50));

  const args = parseArgs(process.argv.slice(2));

  const config = validateTriageConfig({
    ...buildTriageConfig(env),
    ...(args.demo ? { simulateActions: true } : {}),
  });

  if (!args.demo && !isClassifierConfigured()) {
    throw TriageError.configuration('Missing required environment variables: AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY');
  }

  logConfiguration(args.demo);

  const engine = new TriageEngine({
    config,
    classifier: createClassifier({ demo: args.demo, model: env.BEDROCK_MODEL_ID }),
    recorder: new JsonlDecisionRecorder(env.AUDIT_LOG_FILE),
    logger,
  });

  const source = new FileAlertSource({
    path: args.demo ? env.DEMO_ALERTS_FILE : env.ALERTS_FILE,
    limit: args.limit,
    logger,
  });
  const alerts = await source.next();

  if (alerts.length === 0) {
    console.log('No alerts found to process');
  } else {
    console.log(`Processing ${alerts.length} alerts...\n`);
  }

  // Finish the alert in flight, then persist the summary and exit
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`\nShutdown signal received (${signal}). Finishing current alert and exiting...`);
    engine.cancel(`received ${signal}`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await engine.run(alerts);
    console.log('');
    for (const line of formatSummaryReport(summary)) {
      console.log(line);
    }
    console.log(`Audit log: ${env.AUDIT_LOG_FILE}`);
    return summary.cancelled ? EXIT_CANCELLED : EXIT_OK;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Triage session aborted');
    console.error(`\nAlert triage failed: ${describeError(error)}`);
    process.exitCode = exitCodeFor(error);
  });
