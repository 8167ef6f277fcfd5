/*
  Usage:
    npx tsx scripts/load-pdata.ts --root /abs/path/to/PData [--root /another/PData] [--gap 30] [--strict] [--calendar]

  Loads every patient under the roots and prints the load report as JSON.
  With --calendar, also prints each loaded patient's treatment calendar.
*/
import { loadReportSchema } from '../shared/schema';
import { logger } from '../server/logger';
import { PatientCollection } from '../server/sgrt';
import { serializeCalendar } from '../server/sgrt/serialize';

interface CliArgs {
  roots: string[];
  gap?: number;
  strict: boolean;
  calendar: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { roots: [], strict: false, calendar: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--root') args.roots.push(argv[++i] ?? '');
    else if (arg === '--gap') args.gap = Number(argv[++i]);
    else if (arg === '--strict') args.strict = true;
    else if (arg === '--calendar') args.calendar = true;
    else throw new Error(`Unknown argument: ${arg}`);
  }
  if (args.roots.length === 0 || args.roots.some(root => !root)) throw new Error('--root is required');
  if (args.gap !== undefined && !(args.gap > 0)) throw new Error('--gap must be a positive number of minutes');
  return args;
}

function main() {
  const args = parseArgs(process.argv.slice(2));
  const collection = PatientCollection.load(args.roots, {
    config: { sessionGapMinutes: args.gap, strictMode: args.strict },
    logger,
  });

  const output: Record<string, unknown> = { report: loadReportSchema.parse(collection.report) };
  if (args.calendar) {
    output.calendars = [...collection].flatMap(patient => (patient.calendar ? [serializeCalendar(patient.calendar)] : []));
  }
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  process.exitCode = collection.report.failed > 0 ? 1 : 0;
}

try {
  main();
} catch (error) {
  logger.error(error, 'load-pdata');
  process.exitCode = 2;
}
