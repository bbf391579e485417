#!/usr/bin/env node

import { parseCliArgs, type CliArgs } from './cli/args.js';
import { formatResultTable, formatSummary } from './cli/formatResults.js';
import { DatasetConfig } from './config/dataset.js';
import { DEFAULT_MODELS, ExtractionConfig } from './config/extraction.js';
import { ScopusConfig } from './config/scopus.js';
import { errorMessage, JournalPipelineError } from './core/errors.js';
import type { Credentials } from './core/types.js';
import type { EnrichmentProgress, EnrichmentRun } from './pipeline/EnrichmentPipeline.js';
import { createJournalAnalyzer, loadAnalyzerSettings } from './pipeline/factory.js';
import { logger } from './utils/logger.js';

/**
 * CLI for Journal Quality Analysis
 *
 * Usage:
 *   npm run dev categories [filter]        - List category labels in the dataset
 *   npm run dev category <name>            - Analyse every journal in a category
 *   npm run dev search <journal name>      - Analyse journals whose title matches
 *   npm run dev check-config               - Validate configuration
 *
 * Options:
 *   --scopus-key <key>       Elsevier API key (or ELSEVIER_API_KEY)
 *   --extraction-key <key>   LLM provider API key (or EXTRACTION_API_KEY)
 *   --provider <name>        gemini | openai | anthropic (or EXTRACTION_PROVIDER)
 *   --model <name>           Override the provider's default model
 *   --json                   Print results as JSON
 */

function showHelp(): void {
  console.log(`
Journal Quality Analyzer

Commands:
  categories [filter]          List category labels (optionally containing <filter>)
  category <name>              Analyse all journals whose categories contain <name>
  search <journal name>        Analyse journals whose title contains <journal name>
  check-config                 Validate dataset, Scopus and extraction configuration
  help                         Show this help

Options:
  --scopus-key <key>           Elsevier API key; without it Scopus status is "?"
  --extraction-key <key>       LLM API key; without it APC/frequency/OA/hybrid are unknown
  --provider <name>            gemini | openai | anthropic
  --model <name>               Model override for the extraction provider
  --json                       Print results as JSON
`);
}

function resolveCredentials(args: CliArgs): Credentials {
  const scopus = ScopusConfig.getConfig();
  const extraction = ExtractionConfig.getConfig();
  return {
    scopusApiKey: args.scopusKey ?? scopus.apiKey,
    extractionApiKey: args.extractionKey ?? extraction.apiKey,
  };
}

function printRun(run: EnrichmentRun, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(run.results, null, 2));
    return;
  }

  if (run.results.length === 0) {
    console.log('\nNo journals found. Try a different search term or check spelling.');
    return;
  }

  console.log(`\n${formatResultTable(run.results)}\n`);
  console.log(formatSummary(run.summary));
}

function checkConfig(): boolean {
  const results = [DatasetConfig.validate(), ScopusConfig.validate(), ExtractionConfig.validate()];
  const ok = results.every(Boolean);
  console.log(ok ? '✅ Configuration valid' : '❌ Configuration invalid (see log above)');
  return ok;
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.command === 'help') {
    showHelp();
    return 0;
  }
  if (args.command === 'check-config') {
    return checkConfig() ? 0 : 1;
  }

  const settings = loadAnalyzerSettings();
  if (args.provider) {
    settings.extraction.provider = args.provider;
    settings.extraction.model = args.model ?? DEFAULT_MODELS[args.provider];
  } else if (args.model) {
    settings.extraction.model = args.model;
  }
  const analyzer = createJournalAnalyzer(settings);

  switch (args.command) {
    case 'categories': {
      const filter = args.argument.toLowerCase();
      const categories = (await analyzer.listCategories()).filter((category) =>
        category.toLowerCase().includes(filter)
      );
      if (args.json) {
        console.log(JSON.stringify(categories, null, 2));
      } else {
        categories.forEach((category) => console.log(category));
      }
      return 0;
    }

    case 'category':
    case 'search': {
      if (!args.argument) {
        console.error(`Usage: ${args.command} <${args.command === 'category' ? 'category name' : 'journal name'}>`);
        return 1;
      }

      const credentials = resolveCredentials(args);
      const options = {
        onProgress: ({ completed, total, title }: EnrichmentProgress) =>
          logger.info(`[${completed}/${total}] ${title}`),
      };
      const run =
        args.command === 'category'
          ? await analyzer.analyzeCategory(args.argument, credentials, options)
          : await analyzer.analyzeByName(args.argument, credentials, options);

      printRun(run, args.json);
      return 0;
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof JournalPipelineError) {
      logger.error(error.message, { code: error.code });
    } else {
      logger.error('Fatal error', { error: errorMessage(error) });
    }
    process.exitCode = 1;
  });
