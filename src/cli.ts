import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseOutputFormat } from './config.js';
import { dispatch } from './dispatcher.js';
import { aggregate } from './metrics.js';
import { printReport } from './reporter.js';
import { buildRequestSpec, methodCarriesBody } from './request.js';
import { saveSamples } from './results-file.js';

interface RunOptions {
  url?: string;
  method?: string;
  concurrency?: string;
  timeout?: string;
  header: string[];
  body?: string;
  verbose?: boolean;
  output?: string;
  save?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('loadburst')
    .description('Fire concurrent HTTP requests at an endpoint and report latency, throughput and status codes')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Send one request per concurrent user and print a report.\n-o picks the report format; use --save <file> to write the raw samples to a file.')
    .option('-u, --url <url>', 'Target URL (default: $LOADBURST_URL)')
    .option('-m, --method <method>', 'HTTP method: GET, POST, PUT, DELETE, PATCH (default: GET)')
    .option('-c, --concurrency <number>', 'Number of concurrent users (default: 10)')
    .option('-t, --timeout <seconds>', 'Timeout for each request in seconds (default: 30)')
    .option('-H, --header <header>', 'Extra "Name: Value" header, repeatable', collect, [])
    .option('-b, --body <body>', 'Request body (POST, PUT, PATCH, DELETE)')
    .option('-v, --verbose', 'Print every response as it arrives')
    .option('-o, --output <format>', 'Report format: pretty, json, csv (default: pretty; this is not the samples file, see --save)')
    .option('--save <file>', 'Write every sample to a file, one JSON object per line')
    .action(async (options: RunOptions) => {
      try {
        const cfg = loadConfig();
        const url = options.url ?? cfg.url;

        if (!url) {
          console.error('Error: Target URL required. Use --url or set LOADBURST_URL');
          process.exit(2);
        }

        const spec = buildRequestSpec({
          url,
          method: options.method ?? cfg.method,
          headers: options.header,
          body: options.body,
          timeout: options.timeout !== undefined ? Number(options.timeout) : cfg.timeout,
          concurrency: options.concurrency !== undefined ? Number(options.concurrency) : cfg.concurrency,
        });
        const format = options.output !== undefined ? parseOutputFormat(options.output) : cfg.output;

        if (spec.body !== undefined && !methodCarriesBody(spec.method)) {
          console.error(chalk.yellow(`Warning: ${spec.method} requests carry no body; --body is ignored`));
        }

        if (format === 'pretty') {
          console.log(`Running load test: ${spec.concurrency} concurrent ${spec.method} requests to ${spec.url}`);
        }

        const result = await dispatch(spec, {
          userAgent: cfg.userAgent,
          onSample: options.verbose
            ? (sample) => console.log(chalk.gray(`worker ${sample.worker}: ${sample.status} in ${Math.round(sample.latency)}ms`))
            : undefined,
        });

        const report = aggregate(result.samples, {
          issued: result.issued,
          wallClockMs: result.wallClockMs,
          startedAt: result.startedAt,
          failures: result.failures,
        });
        printReport(report, { format, url: spec.url });

        if (options.save) {
          await saveSamples(options.save, result.samples);
          if (format === 'pretty') {
            console.log(`Saved ${result.samples.length} samples to ${options.save}`);
          }
        }

        process.exit(report.failed > 0 || report.dropped > 0 ? 1 : 0);
      } catch (error) {
        if (error instanceof Error) {
          console.error(`Error: ${error.message}`);
        } else {
          console.error('An unknown error occurred');
        }
        process.exit(2);
      }
    });

  return program;
}
