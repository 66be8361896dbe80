/**
 * Analyze a telemetry CSV from the command line
 *
 * Prints the ranked segment table and a one-line headline, or the full
 * report with --json.
 *
 * Usage: npm run analyze -- data/session.csv --segments 8 --max-dt 0.5
 */

import * as dotenv from 'dotenv';
import { analyzeTelemetry } from '../src/analysis/analyzer';
import { ConfigError, SchemaError } from '../src/analysis/errors';
import { CLI_USAGE, CliOptions, CliUsageError, parseCliArgs } from '../src/cli/args';
import { resolveAnalysisConfig, serializeAnalysisConfig } from '../src/config/analysis';
import { loadTelemetryFile } from '../src/ingestion/csv-loader';
import { buildHeadline, formatReportTable, toAnalysisRecord } from '../src/presentation/report-formatter';

dotenv.config();

function main(): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.error(CLI_USAGE);
      return 2;
    }
    throw err;
  }

  if (options.help || options.file === null) {
    console.log(CLI_USAGE);
    return options.help ? 0 : 2;
  }

  try {
    const config = resolveAnalysisConfig(options.configInput);
    const csv = loadTelemetryFile(options.file);
    const result = analyzeTelemetry(csv.rows, config, { columns: csv.columns });

    if (options.json) {
      console.log(JSON.stringify({
        config: serializeAnalysisConfig(config),
        headline: buildHeadline(result.segments),
        segments: result.segments.map(toAnalysisRecord),
        diagnostics: result.diagnostics
      }, null, 2));
      return 0;
    }

    const { diagnostics } = result;
    console.log(`File: ${options.file}`);
    console.log(
      `Rows: ${diagnostics.rows_received} (${diagnostics.rows_dropped} dropped), ` +
      `laps used: ${diagnostics.laps_used}/${diagnostics.laps_total}, ` +
      `deltas discarded: ${diagnostics.deltas_discarded_non_positive} non-positive, ` +
      `${diagnostics.deltas_discarded_dropout} dropout`
    );
    console.log('');
    for (const line of formatReportTable(result.segments, config.nSegments)) {
      console.log(line);
    }
    console.log('');
    console.log(buildHeadline(result.segments));
    return 0;
  } catch (err) {
    if (err instanceof SchemaError || err instanceof ConfigError) {
      console.error(`✗ ${err.message}`);
      return 1;
    }
    throw err;
  }
}

try {
  process.exitCode = main();
} catch (err) {
  console.error('Fatal error:', err);
  process.exitCode = 1;
}
