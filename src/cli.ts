#!/usr/bin/env node
import { promises as fs } from 'fs';
import * as readline from 'readline';
import { renderForest, renderForestJson, renderLabelSummary, summarizeByLabel } from './shared/callTree';
import { MalformedCycleCountError, SpanTraceBuilder } from './shared/spanTrace';
import type { ParseResult } from './shared/spanTrace';
import { loadCliConfig, type Env } from './utils/config';
import { logError, logTrace, setTraceEnabled } from './utils/logger';

export type CliParseOptions = {
  tracePath?: string;
  topLevelLabel?: string;
  showSelf?: boolean;
  flat?: boolean;
  json?: boolean;
  strictSections?: boolean;
};

export type CliParseResult = {
  options: CliParseOptions;
  showHelp?: boolean;
  showVersion?: boolean;
  error?: string;
};

export function parseArgs(argv: string[]): CliParseResult {
  const options: CliParseOptions = {};
  const positionals: string[] = [];

  for (const arg of argv) {
    switch (arg) {
      case '--help':
      case '-h':
        return { options, showHelp: true };
      case '--version':
      case '-v':
        return { options, showVersion: true };
      case '--self':
        options.showSelf = true;
        break;
      case '--flat':
        options.flat = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--strict-sections':
        options.strictSections = true;
        break;
      default:
        if (arg.startsWith('-')) {
          return { options, error: `Unknown argument: ${arg}` };
        }
        positionals.push(arg);
    }
  }

  if (positionals.length > 2) {
    return { options, error: `Unexpected argument: ${positionals[2]}` };
  }
  const [tracePath, topLevelLabel] = positionals;
  if (!tracePath) {
    return { options, error: 'Missing trace file path' };
  }
  if (!topLevelLabel) {
    return { options, error: 'Missing top-level label' };
  }
  options.tracePath = tracePath;
  options.topLevelLabel = topLevelLabel;
  return { options };
}

export type CliDeps = {
  // Yields the file's lines without their terminators; open failures surface on iteration
  readLines: (path: string) => AsyncIterable<string>;
  out: (text: string) => void;
  err: (text: string) => void;
  env: Env;
};

export async function* readTraceLines(path: string): AsyncGenerator<string> {
  const handle = await fs.open(path, 'r');
  const input = handle.createReadStream({ encoding: 'utf8' });
  try {
    yield* readline.createInterface({ input, crlfDelay: Infinity });
  } finally {
    // Also closes the handle when the caller stops early
    input.destroy();
  }
}

const defaultDeps: CliDeps = {
  readLines: readTraceLines,
  out: text => {
    process.stdout.write(text);
  },
  err: text => {
    process.stderr.write(`${text}\n`);
  },
  env: process.env
};

export function formatUsage(): string {
  return [
    'Usage: span-tree [options] <trace-file> <top-level-label>',
    '',
    'Aggregates ┌╴/└╴ span markers into a call-cost tree.',
    '',
    'Options:',
    '  --self              Show self cycles (total minus children) on each line',
    '  --flat              Append per-label totals after the tree',
    '  --json              Print the forest as JSON',
    '  --strict-sections   Ignore nested markers inside skipped top-level sections',
    '  -h, --help          Show this help text',
    '  -v, --version       Show version',
    '',
    'Environment:',
    '  SPAN_TREE_INDENT    Indent width in spaces (0-8, default 2)',
    '  SPAN_TREE_TRACE     Log parse diagnostics to stderr'
  ].join('\n');
}

export function formatVersion(env: Env): string {
  const version = env.npm_package_version ?? '0.0.0';
  return `span-tree ${version}`;
}

function reportIssues(result: ParseResult): void {
  for (const issue of result.issues) {
    logTrace(`line ${issue.line}: [${issue.code}] ${issue.message}`);
  }
  logTrace('parse stats', result.stats);
}

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.showHelp) {
    deps.err(formatUsage());
    return 0;
  }

  if (parsed.showVersion) {
    deps.err(formatVersion(deps.env));
    return 0;
  }

  const { tracePath, topLevelLabel } = parsed.options;
  if (parsed.error || !tracePath || !topLevelLabel) {
    deps.err(parsed.error ?? 'Invalid arguments');
    deps.err(formatUsage());
    return 1;
  }

  const config = loadCliConfig(deps.env);
  setTraceEnabled(config.trace);

  const builder = new SpanTraceBuilder({ topLevelLabel, strictSections: parsed.options.strictSections });
  try {
    for await (const line of deps.readLines(tracePath)) {
      builder.push(line);
    }
  } catch (e) {
    if (e instanceof MalformedCycleCountError) {
      deps.err(e.message);
      return 1;
    }
    const reason = e instanceof Error ? e.message : String(e);
    deps.err(`Failed to read ${tracePath}: ${reason}`);
    return 1;
  }
  const result = builder.finish();
  reportIssues(result);

  if (parsed.options.json) {
    deps.out(`${renderForestJson(result.roots)}\n`);
    return 0;
  }

  const lines = renderForest(result.roots, {
    indentUnit: ' '.repeat(config.indentWidth),
    showSelf: parsed.options.showSelf
  });
  if (parsed.options.flat && result.roots.length) {
    lines.push('', ...renderLabelSummary(summarizeByLabel(result.roots)));
  }
  if (lines.length) {
    deps.out(`${lines.join('\n')}\n`);
  }
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(error);
      process.exitCode = 1;
    });
}
