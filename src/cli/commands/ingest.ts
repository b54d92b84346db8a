import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../../config/env';
import { createRuntime } from '../../runtime';
import { errorMessage } from '../../utils/logger';

const sourceConfigSchema = z.record(z.string(), z.unknown());

/**
 * Parse `--config`: inline JSON, or `@path` to read JSON from a file.
 */
export function parseSourceConfig(
  value: string,
  readFile: (path: string) => string = path => readFileSync(path, 'utf8')
): Record<string, unknown> {
  const text = value.startsWith('@') ? readFile(value.slice(1)) : value;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new Error(`--config is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = sourceConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error('--config must be a JSON object');
  }
  return parsed.data;
}

export const ingestCommand = new Command('ingest')
  .description('Run one ingestion attempt in-process and print the outcome')
  .argument('<adapter>', 'Adapter name (json, csv, rest, html)')
  .option('-c, --config <json>', 'Source config as JSON, or @file to read it from a file', '{}')
  .option('--correlation-id <id>', 'Correlation ID to tag the attempt with')
  .option('--redis', 'Persist and publish through Redis as configured in the environment')
  .action(async (adapter: string, options: { config: string; correlationId?: string; redis?: boolean }) => {
    let sourceConfig: Record<string, unknown>;
    try {
      sourceConfig = parseSourceConfig(options.config);
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 2;
      return;
    }

    const config = loadConfig();
    if (!options.redis) {
      config.redis.enabled = false;
    }

    const runtime = await createRuntime(config);
    try {
      const outcome = await runtime.orchestrator.execute(
        {
          adapterType: adapter,
          sourceConfig,
          attempt: 0,
          ...(options.correlationId ? { correlationId: options.correlationId } : {})
        },
        { allowRedelivery: false }
      );

      if (outcome.status === 'succeeded') {
        console.log(JSON.stringify(outcome.payload, null, 2));
      } else {
        console.error(JSON.stringify(outcome.report, null, 2));
        process.exitCode = 1;
      }
    } finally {
      await runtime.stop();
    }
  });
