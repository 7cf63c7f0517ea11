import { parseArgs } from 'util';
import {
  DownloadConfigInput,
  parseDownloadConfigJson,
} from '../config/download-config.schema';
import { ConfigValidationError, describeError } from '../domain/errors/downloader.errors';

export const USAGE = [
  'Usage: model-fetcher -s <source> [<source>...] -o <output-dir> [-m <model-name>] [-c <json>]',
  '',
  'Sources:',
  '  s3://bucket/prefix     S3 object storage',
  '  obs://bucket/prefix    S3-compatible object storage (needs an endpoint)',
  '  pvc://path             directory on the shared volume',
  '  hf://org/name, org/name  model hub repository',
  '',
  'Options:',
  '  -s, --sources      one or more sources, downloaded in order',
  '  -o, --output-dir   directory to download into',
  '  -m, --model-name   subdirectory of the output dir',
  '  -c, --config       JSON object with credentials and transfer options',
  '  -h, --help         show this help',
].join('\n');

export interface CliArguments {
  sources: string[];
  outputDir: string;
  modelName?: string;
  config: DownloadConfigInput;
}

export type CliCommand = { kind: 'help' } | { kind: 'download'; args: CliArguments };

/**
 * Parses the command line (without the node and script entries).
 * Bare words after the flags are taken as further sources.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseFlags(argv);

  if (values.help) {
    return { kind: 'help' };
  }

  const sources = [...(values.sources ?? []), ...positionals].filter((source) => source.trim() !== '');
  if (sources.length === 0) {
    throw usageError('at least one source is required (-s/--sources)');
  }

  const outputDir = values['output-dir'];
  if (!outputDir || outputDir.trim() === '') {
    throw usageError('an output directory is required (-o/--output-dir)');
  }

  return {
    kind: 'download',
    args: {
      sources,
      outputDir,
      modelName: values['model-name'],
      config: values.config ? parseDownloadConfigJson(values.config) : {},
    },
  };
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        sources: { type: 'string', short: 's', multiple: true },
        'output-dir': { type: 'string', short: 'o' },
        'model-name': { type: 'string', short: 'm' },
        config: { type: 'string', short: 'c' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw usageError(describeError(error));
  }
}

function usageError(reason: string): ConfigValidationError {
  return new ConfigValidationError(`Invalid arguments: ${reason}\n\n${USAGE}`, [reason]);
}
