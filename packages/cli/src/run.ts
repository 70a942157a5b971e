import { createInflector, type Inflector, type InflectionTrace } from 'pluralizer';
import { readFileSync, writeFileSync } from 'node:fs';
import { globSync } from 'glob';
import pc from 'picocolors';
import { printTrace, type Output } from './table';

export const HELP = `
Usage: pluralizer <command> [options]

Commands:
  plural <word...>      Print the plural of each word
  singular <word...>    Print the singular of each word
  count <word> <n>      Print the form of a word for a count
  file <pathGlob>       Inflect every word listed in matching files (one per line)

Options:
  --count <n>           Count used by the file command (default: 2)
  --inclusive           Prefix each result with the count
  --rules <file>        Load an extra JSON rule set
  --explain             Show which table resolved each word
  --json                Output JSON
  --out <file>          Write JSON output to file
`;

const VALUE_OPTIONS = new Set(['--count', '--rules', '--out']);

type ParsedArgs = {
  command: string | undefined;
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
};

type Inflection = {
  word: string;
  result: string;
  file?: string;
  trace?: InflectionTrace;
};

function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_OPTIONS.has(arg)) {
      const value = args[i + 1];
      if (value !== undefined) values.set(arg, value);
      i++;
    } else if (arg.startsWith('-') && Number.isNaN(Number(arg))) {
      // Negative numbers stay positional so `count cat -1` works
      flags.add(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { command: positionals[0], positionals: positionals.slice(1), flags, values };
}

function parseCount(raw: string | undefined, fallback?: number): number | null {
  if (raw === undefined) return fallback ?? null;
  const count = Number(raw);
  return Number.isInteger(count) ? count : null;
}

/** One word per line; blank lines and `#` comments are skipped. */
export function readWordList(file: string): string[] {
  return readFileSync(file, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function inflect(
  inflector: Inflector,
  words: string[],
  count: number,
  inclusive: boolean,
  withTrace: boolean,
  file?: string
): Inflection[] {
  return words.map((word) => {
    const trace = inflector.explain(word, count === 1 ? 'singular' : 'plural');
    return {
      word,
      result: inclusive ? `${count} ${trace.output}` : trace.output,
      ...(file ? { file } : {}),
      ...(withTrace ? { trace } : {})
    };
  });
}

/**
 * Run the CLI with `args` (without the node and script paths).
 * Returns the process exit code.
 */
export function run(args: string[], out: Output = console): number {
  const parsed = parseArgs(args);
  const { command, positionals, flags, values } = parsed;

  if (!command || flags.has('--help') || flags.has('-h') || command === 'help') {
    out.log(HELP);
    return 0;
  }

  const jsonOutput = flags.has('--json');
  const explainOutput = flags.has('--explain');
  const inclusive = flags.has('--inclusive');
  const outFile = values.get('--out') ?? null;
  const rulesFile = values.get('--rules');

  const inflector = createInflector();
  if (rulesFile) {
    try {
      inflector.loadRuleSet(JSON.parse(readFileSync(rulesFile, 'utf-8')), rulesFile);
    } catch (error) {
      out.error(pc.red(`Error loading rules: ${error instanceof Error ? error.message : String(error)}`));
      return 1;
    }
  }

  let results: Inflection[];

  switch (command) {
    case 'plural':
    case 'singular': {
      if (positionals.length === 0) {
        out.error(pc.red(`Error: ${command} needs at least one word`));
        return 1;
      }
      results = inflect(inflector, positionals, command === 'singular' ? 1 : 2, false, explainOutput);
      break;
    }

    case 'count': {
      const [word, rawCount] = positionals;
      const count = parseCount(rawCount);
      if (!word || count === null) {
        out.error(pc.red('Error: count needs a word and an integer count'));
        return 1;
      }
      results = inflect(inflector, [word], count, inclusive, explainOutput);
      break;
    }

    case 'file': {
      const pathGlob = positionals[0];
      const count = parseCount(values.get('--count'), 2);
      if (!pathGlob) {
        out.error(pc.red('Error: pathGlob required'));
        return 1;
      }
      if (count === null) {
        out.error(pc.red('Error: --count must be an integer'));
        return 1;
      }

      const files = globSync(pathGlob).sort();
      if (files.length === 0) {
        out.error(pc.red(`Error: no files match ${pathGlob}`));
        return 1;
      }

      results = [];
      for (const file of files) {
        try {
          const fileResults = inflect(inflector, readWordList(file), count, inclusive, explainOutput, file);
          results.push(...fileResults);

          if (!jsonOutput) {
            out.log(pc.bold(`\n${file}:`));
            for (const item of fileResults) {
              out.log(`  ${item.word} -> ${item.result}`);
              if (item.trace) printTrace(item.trace, out);
            }
          }
        } catch (error) {
          out.error(`${pc.red(`Error processing ${file}:`)} ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      break;
    }

    default:
      out.error(pc.red(`Unknown command: ${command}`));
      return 1;
  }

  if (jsonOutput || outFile) {
    const json = JSON.stringify(results, null, 2);
    if (outFile) {
      try {
        writeFileSync(outFile, json, 'utf-8');
      } catch (error) {
        out.error(pc.red(`Error writing ${outFile}: ${error instanceof Error ? error.message : String(error)}`));
        return 1;
      }
      out.log(pc.green(`Results written to ${outFile}`));
    } else {
      out.log(json);
    }
  } else if (command !== 'file') {
    for (const item of results) {
      out.log(item.result);
      if (item.trace) printTrace(item.trace, out);
    }
  }

  return 0;
}
