#!/usr/bin/env node
import { cac } from 'cac';
import { analyzeCommand, type AnalyzeOptions } from '../src/cli/commands/analyze.js';
import { handleError } from '../src/cli/utils/error-handler.js';

const cli = cac('minilang-analyze');

cli
  .command('analyze <file>', 'Check an AST JSON file and print its usage metrics')
  .option('--json', 'Print metrics as a JSON object')
  .action((file: string, options: AnalyzeOptions) => {
    try {
      analyzeCommand(file, { json: Boolean(options.json) });
    } catch (error) {
      handleError(error);
    }
  });

cli.help();
cli.parse();
