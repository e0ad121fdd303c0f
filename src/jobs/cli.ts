import { ConfigurationError } from '../errors';
import { ExportFormat, isExportFormat } from '../services/exporters';

export interface CliOptions {
  urls: string[];
  file?: string;
  csv?: string;
  outputFormat: ExportFormat;
  outputPath?: string;
  delaySeconds?: number;
  maxRetries?: number;
  headless?: boolean;
  ignoreHistory: boolean;
  notify: boolean;
  testNotification: boolean;
  help: boolean;
}

export const USAGE = `
Usage: vacancy-check [options]

Targets (first one given wins):
  -u, --urls <url...>        Listing page URLs
  -f, --file <path>          Text file; every listing URL in it is checked
  -c, --csv <path>           CSV file of properties (listing sheet or url column)

Options:
  -o, --output-format <fmt>  json | csv | txt (default: json)
  -p, --output-path <path>   Where to write the export
  -d, --delay <seconds>      Delay between requests
      --max-retries <n>      Navigation attempts per page
      --no-headless          Show the browser window
      --ignore-history       Notify without comparing to the previous run
      --no-notify            Do not send push notifications
      --test-notification    Send a test push notification and exit
  -h, --help                 Show this help
`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

function parseNumber(raw: string, flag: string, min: number): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigurationError(`${flag} must be a number >= ${min} (got "${raw}")`);
  }
  return value;
}

/**
 * Parse command line arguments for a one-off check
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    urls: [],
    outputFormat: 'json',
    ignoreHistory: false,
    notify: true,
    testNotification: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-u':
      case '--urls':
        // Takes every following value up to the next flag
        requireValue(argv, i + 1, arg);
        while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
          opts.urls.push(argv[++i]);
        }
        break;
      case '-f':
      case '--file':
        opts.file = requireValue(argv, ++i, arg);
        break;
      case '-c':
      case '--csv':
        opts.csv = requireValue(argv, ++i, arg);
        break;
      case '-o':
      case '--output-format': {
        const format = requireValue(argv, ++i, arg);
        if (!isExportFormat(format)) {
          throw new ConfigurationError(`${arg} must be one of json, csv, txt (got "${format}")`);
        }
        opts.outputFormat = format;
        break;
      }
      case '-p':
      case '--output-path':
        opts.outputPath = requireValue(argv, ++i, arg);
        break;
      case '-d':
      case '--delay':
        opts.delaySeconds = parseNumber(requireValue(argv, ++i, arg), arg, 0);
        break;
      case '--max-retries':
        opts.maxRetries = parseNumber(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--no-headless':
        opts.headless = false;
        break;
      case '--ignore-history':
        opts.ignoreHistory = true;
        break;
      case '--no-notify':
        opts.notify = false;
        break;
      case '--test-notification':
        opts.testNotification = true;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  return opts;
}
