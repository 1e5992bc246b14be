/**
 * @file CLI Argument Parsing
 *
 * @module cli/args
 */

import { ConfigurationError } from '../errors.js';

export type CommandName = 'run' | 'plan' | 'cache-clear' | 'help';

/**
 * Parsed command line.
 *
 * @property positionals - Workflow file, then optional dataset file
 * @property concurrency - Raw `--concurrency` value; settings validate it
 */
export interface CliArgs {
    command: CommandName;
    positionals: string[];
    bestEffort: boolean;
    fast: boolean;
    mock: boolean;
    json: boolean;
    verbose: boolean;
    quiet: boolean;
    cacheDir: string | null;
    concurrency: string | null;
}

export const USAGE = `Usage:
  analysis-flow run <workflow.yaml> [dataset.txt|dataset.json] [options]
  analysis-flow plan <workflow.yaml> [dataset.txt|dataset.json]
  analysis-flow cache-clear --cache-dir <dir>

Options:
  --best-effort        Keep independent steps running after a failure
  --fast               Request fast (synchronous) processing where steps leave it unset
  --cache-dir <dir>    Persist results under <dir>
  --concurrency <n>    Steps in flight at once
  --mock               Answer every step in-process instead of calling the API
  --json               Print results as JSON
  --verbose, -v        Log every poll and step start
  --quiet, -q          Log failures only`;

const COMMANDS: readonly CommandName[] = ['run', 'plan', 'cache-clear', 'help'];

function command_is(value: string): value is CommandName {
    return COMMANDS.some((command: CommandName): boolean => command === value);
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {ConfigurationError} On unknown commands or options
 */
export function args_parse(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        command: 'help',
        positionals: [],
        bestEffort: false,
        fast: false,
        mock: false,
        json: false,
        verbose: false,
        quiet: false,
        cacheDir: null,
        concurrency: null,
    };

    const [first, ...rest] = argv;
    if (first === undefined || first === '--help' || first === '-h') return args;
    if (!command_is(first)) {
        throw new ConfigurationError(`Unknown command '${first}'`);
    }
    args.command = first;

    for (let i = 0; i < rest.length; i++) {
        const token: string = rest[i];
        const next: string | undefined = rest[i + 1];
        switch (token) {
            case '--best-effort': args.bestEffort = true; break;
            case '--fast':        args.fast = true; break;
            case '--mock':        args.mock = true; break;
            case '--json':        args.json = true; break;
            case '--verbose':
            case '-v':            args.verbose = true; break;
            case '--quiet':
            case '-q':            args.quiet = true; break;
            case '--cache-dir':
            case '--concurrency': {
                if (next === undefined || next.startsWith('--')) {
                    throw new ConfigurationError(`Option ${token} requires a value`);
                }
                if (token === '--cache-dir') args.cacheDir = next;
                else args.concurrency = next;
                i++;
                break;
            }
            default:
                if (token.startsWith('-')) {
                    throw new ConfigurationError(`Unknown option '${token}'`);
                }
                args.positionals.push(token);
        }
    }
    return args;
}
