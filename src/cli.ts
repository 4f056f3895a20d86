/**
 * Command line front end: parse dumps, filter, group and print them
 */

import minimist from 'minimist';
import { red } from 'kolorist';
import { FilterParser, filterGoroutines } from './app/filter.js';
import { groupGoroutines } from './app/grouping.js';
import { parseInput } from './app/inputs.js';
import { COLOR_PALETTE, PLAIN_PALETTE, renderJSON, renderText, type InputReport } from './app/report.js';
import { SettingsManager } from './app/SettingsManager.js';
import { DumpParser } from './parser/parser.js';
import type { DumpSource, ParserLogger } from './parser/types.js';

interface CliArgs {
  search?: string;
  filter?: string;
  config?: string;
  group: boolean;
  json: boolean;
  quiet: boolean;
  color: boolean;
  help: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin: DumpSource;
  cwd: string;
}

export const USAGE = `Usage: goroutine-lens [options] <file...>

Parse Go goroutine stack dumps (plain text, .gz, or zip archives; "-" reads stdin).

Options:
  -s, --search <text>   only goroutines whose stack contains <text>
  -f, --filter <query>  filter query, e.g. "state:chan wait:>5 -locked:true"
  -g, --group           group goroutines with identical stacks
      --json            print JSON
      --config <path>   settings file (default: ./.goroutine-lens.json)
  -q, --quiet           do not report skipped blocks and frames
      --no-color        disable colors
  -h, --help            show this help
`;

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  stdin: process.stdin,
  cwd: process.cwd(),
};

/**
 * Run the CLI and resolve to its exit code: 0 on success, 1 when an input
 * could not be read, 2 for usage or settings errors
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const args = minimist<CliArgs>(argv, {
    string: ['_', 'search', 'filter', 'config'],
    boolean: ['group', 'json', 'quiet', 'color', 'help'],
    alias: { s: 'search', f: 'filter', g: 'group', q: 'quiet', h: 'help' },
    default: { color: true },
  });

  if (args.help) {
    io.stdout(USAGE);
    return 0;
  }
  const paths = args._;
  if (paths.length === 0) {
    io.stderr(USAGE);
    return 2;
  }

  let settings: SettingsManager;
  try {
    settings = SettingsManager.load(args.config, io.cwd);
  } catch (error) {
    io.stderr(`${red('error')}: ${error instanceof Error ? error.message : String(error)}\n`);
    return 2;
  }

  const query = new FilterParser().parse(args.filter ?? '');
  if (!query.valid) {
    io.stderr(`${red('error')}: invalid filter: ${query.error}\n`);
    return 2;
  }

  const logger: ParserLogger = args.quiet ? { warn: () => {} } : { warn: message => io.stderr(message + '\n') };
  const parser = new DumpParser({ logger });
  const inputOptions = { zipFilePatterns: settings.getZipFilePatterns(), stdin: io.stdin, logger };

  const reports: InputReport[] = [];
  let failed = false;
  for (const path of paths) {
    for (const { name, result } of await parseInput(path, parser, inputOptions)) {
      if (!result.success) {
        io.stderr(`${red('error')}: ${result.error.message}\n`);
        failed = true;
        continue;
      }

      const goroutines = filterGoroutines(result.data.goroutines, query, args.search);
      reports.push({
        name,
        goroutines,
        totalGoroutines: result.data.goroutines.length,
        groups: args.group ? groupGoroutines(goroutines, settings.getTitleRules()) : null,
        diagnostics: result.data.diagnostics,
      });
    }
  }

  if (args.json) {
    io.stdout(renderJSON(reports));
  } else if (reports.length > 0) {
    io.stdout(
      renderText(reports, {
        palette: args.color ? COLOR_PALETTE : PLAIN_PALETTE,
        functionTrimPrefixes: settings.getFunctionTrimPrefixes(),
        fileTrimPrefixes: settings.getFileTrimPrefixes(),
      })
    );
  }

  return failed ? 1 : 0;
}
