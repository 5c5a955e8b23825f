#!/usr/bin/env node

import { ArxivClient } from './api/index.js';
import { config } from './config/index.js';
import { errorMessage } from './errors.js';
import {
  intOption,
  listOption,
  parseArgs,
  runExport,
  runFetch,
  runStats,
  stringOption,
} from './commands/index.js';

function printUsage(): void {
  console.log('Usage: paper-tally <command> [arguments] [options]');
  console.log('');
  console.log('Commands:');
  console.log('  fetch <query>                 Query arXiv and print title, authors and journal ref');
  console.log('    --max N                     Number of results (default: ' + config.maxResults + ')');
  console.log('    --sort FIELD                relevance | lastUpdatedDate | submittedDate');
  console.log('    --order ORDER               ascending | descending');
  console.log('    --out FILE                  Save the papers as CSV');
  console.log('');
  console.log('  stats [csv]                   Most frequent values per multi-valued column');
  console.log('    --fields a,b                Columns to summarize (default: authors, categories, ...)');
  console.log('    --top K                     Entries per column (default: 1)');
  console.log('    --delimiter D               Value separator inside a cell (default: ", ")');
  console.log('    --strip-parens              Drop "(...)" from values before counting');
  console.log('');
  console.log('  export <csv> <field> <out>    Write one column, flattened, one value per row');
  console.log('    --header H                  Header label (default: ' + config.exportHeader + ')');
  console.log('    --delimiter D               Value separator inside a cell');
  console.log('');
  console.log('Example:');
  console.log('  paper-tally fetch "cat:astro-ph.GA" --max 20 --out data/papers.csv');
  console.log('  paper-tally stats data/papers.csv --fields authors,categories --top 5');
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);

  if (!command || command === '--help') {
    printUsage();
    return;
  }

  const args = parseArgs(rest);
  if (args.options.has('--help')) {
    printUsage();
    return;
  }

  const delimiter = stringOption(args, '--delimiter') ?? config.delimiter;

  switch (command) {
    case 'fetch': {
      const query = args.positionals.join(' ');
      if (!query) {
        console.error('Error: a search query is required');
        process.exit(1);
      }

      await runFetch({
        query,
        maxResults: intOption(args, '--max'),
        sortBy: stringOption(args, '--sort'),
        sortOrder: stringOption(args, '--order'),
        out: stringOption(args, '--out'),
        client: new ArxivClient(),
      });
      break;
    }

    case 'stats': {
      await runStats({
        path: args.positionals[0] ?? config.papersCsvPath,
        fields: listOption(args, '--fields'),
        k: intOption(args, '--top'),
        delimiter,
        stripParens: args.options.has('--strip-parens'),
      });
      break;
    }

    case 'export': {
      const [path, field, out] = args.positionals;
      if (!path || !field || !out) {
        console.error('Error: export needs <csv> <field> <out>');
        process.exit(1);
      }

      await runExport({
        path,
        field,
        out,
        header: stringOption(args, '--header') ?? config.exportHeader,
        delimiter,
      });
      break;
    }

    default:
      console.error(`Error: unknown command "${command}"`);
      printUsage();
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
