#!/usr/bin/env node
/**
 * Creative Pipeline command-line entry point
 *
 *   generate <prompt...> [--user <id>] [--json]
 *   history [--limit <n>] [--since <day|week|month|Nd|date>]
 *   search <query> [--limit <n>] [--since ...]
 *   clear --yes
 *   stats
 *   status
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import logger from './utils/logger.js';
import { loadConfig, describeConfig } from './utils/config.js';
import ConfigValidator from './utils/ConfigValidator.js';
import errorHandler, { getErrorMessage } from './utils/ErrorHandler.js';
import { checkServices } from './utils/ServiceStatus.js';
import { createServices, serviceTargets, type PipelineServices } from './container.js';
import { formatPipelineMessage } from './pipeline/index.js';
import { parseLimit, parseSince, renderRecord } from './cli/helpers.js';
import type { GenerationRecord } from './types/index.js';

const USAGE = `Usage: creative-pipeline <command> [options]

Commands:
  generate <prompt...>   Enhance a prompt, generate an image and a 3D model
  history                List recent generations
  search <query>         Search past generations
  clear --yes            Delete all saved generations
  stats                  History and artifact storage statistics
  status                 Probe the local LLM and the remote apps

Options:
  --user <id>            User id forwarded to the remote apps
  --limit <n>            Number of records to show (default 10)
  --since <window>       all, day, week, month, <n>d or an ISO date
  --json                 Print machine-readable output
  --yes                  Confirm destructive commands`;

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function printRecords(services: PipelineServices, records: GenerationRecord[]): Promise<void> {
  if (records.length === 0) {
    print('No generations found.');
    return;
  }

  const storedPaths = records.flatMap(record => [record.imagePath, record.modelPath])
    .filter((storedPath): storedPath is string => storedPath !== null);
  const existing = new Set<string>();
  for (const storedPath of storedPaths) {
    if (await services.contentStore.exists(storedPath)) {
      existing.add(storedPath);
    }
  }

  print(`Found ${records.length} generation(s):`);
  for (const record of records) {
    print(renderRecord(record, existing));
  }
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      user: { type: 'string' },
      limit: { type: 'string' },
      since: { type: 'string' },
      json: { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  const [command, ...rest] = positionals;
  if (!command || values.help || command === 'help') {
    print(USAGE);
    return command || values.help ? 0 : 1;
  }

  const validator = new ConfigValidator();
  if (!validator.printResults(validator.validate())) {
    return 1;
  }

  const config = loadConfig();
  logger.debug('Configuration', describeConfig(config));

  if (command === 'status') {
    const report = await checkServices(serviceTargets(config));
    if (values.json) {
      print(JSON.stringify(report, null, 2));
    } else {
      for (const service of report.services) {
        print(`${service.status === 'healthy' ? '✅' : '❌'} ${service.name} (${service.url})${service.error ? `: ${service.error}` : ''}`);
      }
      print(`Overall: ${report.status}`);
    }
    return report.status === 'unhealthy' ? 1 : 0;
  }

  const services = createServices(config);

  try {
    switch (command) {
      case 'generate': {
        const prompt = rest.join(' ');
        const result = await services.orchestrator.run(prompt, values.user ?? config.pipeline.defaultUserId);
        print(values.json ? JSON.stringify(result, null, 2) : formatPipelineMessage(result));
        return result.imageGenerated ? 0 : 1;
      }

      case 'history': {
        const records = services.historyStore.listRecent(parseLimit(values.limit, 10), { since: parseSince(values.since) });
        if (values.json) {
          print(JSON.stringify(records, null, 2));
        } else {
          await printRecords(services, records);
        }
        return 0;
      }

      case 'search': {
        const query = rest.join(' ');
        const records = services.historyStore.search(query, parseLimit(values.limit, 10), { since: parseSince(values.since) });
        if (values.json) {
          print(JSON.stringify(records, null, 2));
        } else {
          await printRecords(services, records);
        }
        return 0;
      }

      case 'clear': {
        if (!values.yes) {
          print('This deletes every saved generation. Re-run with --yes to confirm.');
          return 1;
        }
        const removed = services.historyStore.clearAll();
        print(`Removed ${removed} generation(s).`);
        return 0;
      }

      case 'stats': {
        const stats = {
          database: config.storage.historyDbPath,
          totalRecords: services.historyStore.count(),
          artifacts: await services.contentStore.getStats()
        };
        print(JSON.stringify(stats, null, 2));
        return 0;
      }

      default:
        print(`Unknown command: ${command}\n\n${USAGE}`);
        return 1;
    }
  } finally {
    services.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    errorHandler.handleError(error, { command: process.argv[2] });
    process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  });
