/**
 * Ingest one local export file and print the job report.
 *
 *   npx tsx server/scripts/ingest-file.ts <file> --user <id> [--provider <name>]
 *     [--timezone <IANA zone>] [--dry-run] [--insights]
 *
 * --dry-run keeps everything in memory; nothing touches DATABASE_URL.
 * --insights runs an evaluation cycle after ingestion and prints the feed.
 */

import { randomUUID } from 'crypto';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { ALL_DATA_SOURCES, isDataSource, type DataSource } from '@shared/dataSource';
import { MemStorage } from '../memStorage';
import { storage as databaseStorage, type IStorage } from '../storage';
import { evaluateUserInsights } from '../services/insightEngine';
import { queryInsightFeed } from '../services/insightFeed';
import { IngestionPipeline, readRawFileFromDisk, type IngestionJobReport } from '../services/ingestionPipeline';
import { detectProvider } from '../services/providerAdapters';
import { createLogger } from '../utils/logger';

const logger = createLogger('IngestFile');

const USAGE = 'Usage: npx tsx server/scripts/ingest-file.ts <file> --user <id> [--provider <name>] [--timezone <zone>] [--dry-run] [--insights]';

export interface IngestFileResult {
  exitCode: number;
  report: IngestionJobReport | null;
}

export interface IngestFileDependencies {
  storage?: IStorage;
  print?: (line: string) => void;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      user: { type: 'string' },
      provider: { type: 'string' },
      timezone: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      insights: { type: 'boolean', default: false },
    },
  });
}

export async function runIngestFile(argv: string[], deps: IngestFileDependencies = {}): Promise<IngestFileResult> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    print(error instanceof Error ? error.message : String(error));
    print(USAGE);
    return { exitCode: 2, report: null };
  }

  const { values, positionals } = parsed;
  const filePath = positionals[0];
  const userId = values.user;
  if (!filePath || !userId) {
    print(USAGE);
    return { exitCode: 2, report: null };
  }

  let provider: DataSource | null;
  if (values.provider !== undefined) {
    if (!isDataSource(values.provider)) {
      print(`Unknown provider "${values.provider}". Expected one of: ${ALL_DATA_SOURCES.join(', ')}`);
      return { exitCode: 2, report: null };
    }
    provider = values.provider;
  } else {
    provider = detectProvider(await readRawFileFromDisk(filePath));
    if (!provider) {
      print(`Could not detect the provider of ${filePath}; pass --provider`);
      return { exitCode: 2, report: null };
    }
    logger.info(`Detected provider ${provider} for ${filePath}`);
  }

  const storage = deps.storage ?? (values['dry-run'] ? new MemStorage() : databaseStorage);
  if (values.timezone) {
    await storage.upsertUserProfile(userId, values.timezone);
  }

  const pipeline = new IngestionPipeline({ storage });
  const jobId = randomUUID();
  await pipeline.enqueue({ jobId, userId, rawFileRef: filePath, declaredProvider: provider });
  await pipeline.execute(jobId);
  const report = await pipeline.report(jobId);
  print(JSON.stringify(report, null, 2));

  if (values.insights && report.finalState === 'completed') {
    const outcome = await evaluateUserInsights(userId, { storage });
    logger.info(`Evaluation ${outcome.status} in ${Math.round(outcome.elapsedMs)}ms`);
    const feed = await queryInsightFeed(userId, { storage });
    if (feed.length === 0) {
      print('No significant insights yet.');
    }
    for (const insight of feed) {
      print(`- ${insight.renderedText}`);
    }
  }

  return { exitCode: report.finalState === 'completed' ? 0 : 1, report };
}

// ES module entry point
const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(entryPoint).href) {
  runIngestFile(process.argv.slice(2))
    .then(({ exitCode }) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      logger.error('Ingestion failed', error);
      process.exit(1);
    });
}
