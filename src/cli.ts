#!/usr/bin/env node

/**
 * pdf-citation-renamer CLI - rename PDFs after their citation
 */

import 'dotenv/config';
import { Command } from 'commander';
import clipboard from 'clipboardy';
import * as readline from 'readline/promises';
import { createBatchRenamer } from './index.js';
import { loadConfig, parseNumericOverride } from './config.js';
import { resolveDirectoryInput } from './utils/directory-input.js';
import { errorMessage } from './utils/errors.js';
import type { RunSummary } from './types/index.js';

interface RenameCommandOptions {
  yes: boolean;
  dryRun: boolean;
  lookup: boolean;
  writeMetadata: boolean;
  maxPages?: string;
  maxLength?: string;
  model?: string;
  fromClipboard: boolean;
  verbose: boolean;
}

async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

function printSummary(summary: RunSummary, dryRun: boolean): void {
  for (const result of summary.results) {
    if (result.renamed) {
      console.log(`   ✅ ${result.source} -> ${result.target}`);
    } else if (dryRun && result.target !== result.source) {
      console.log(`   🔎 ${result.source} -> ${result.target} (dry run)`);
    } else {
      console.log(`   ➖ ${result.source} (unchanged)`);
    }
  }

  console.log(`\n========================================`);
  console.log(`📊 RENAMING COMPLETE`);
  console.log(`========================================`);
  console.log(`   Total files: ${summary.total}`);
  console.log(`   ✅ Successful: ${summary.successful}`);
  console.log(`   ❌ Failed: ${summary.failed}`);

  if (summary.errors.length > 0) {
    console.log(`\n❌ Errors (${summary.errors.length}):`);
    summary.errors.forEach((e) => console.log(`   - ${e}`));
  }
  console.log(`========================================\n`);
}

const program = new Command();

program
  .name('pdf-citation-renamer')
  .description('Rename PDF files after their citation (language model + document metadata + Crossref)')
  .version('0.1.0');

/**
 * Rename every PDF in a directory
 */
program
  .command('rename')
  .description('Rename every PDF in a directory after its citation')
  .argument('[directory]', 'Directory containing the PDF files (prompted for when omitted)')
  .option('-y, --yes', 'Skip the confirmation prompt', false)
  .option('--dry-run', 'Show the new names without renaming or writing metadata', false)
  .option('--no-lookup', 'Never query Crossref')
  .option('--no-write-metadata', 'Do not write the citation into the PDF metadata')
  .option('--max-pages <number>', 'Pages of text sent to the model')
  .option('--max-length <number>', 'Maximum filename length, excluding .pdf')
  .option('--model <model>', 'Genkit model name')
  .option('--from-clipboard', 'Read the directory path from the clipboard', false)
  .option('-v, --verbose', 'Enable verbose logging', false)
  .action(async (directoryArg: string | undefined, options: RenameCommandOptions) => {
    try {
      const config = loadConfig();
      if (options.model) config.model = options.model;
      const maxPages =
        options.maxPages === undefined
          ? config.maxPages
          : parseNumericOverride('MAX_PAGES', options.maxPages, '--max-pages');
      const maxFilenameLength =
        options.maxLength === undefined
          ? config.maxFilenameLength
          : parseNumericOverride('MAX_FILENAME_LENGTH', options.maxLength, '--max-length');

      const directory = await resolveDirectoryInput(
        { argument: directoryArg, fromClipboard: options.fromClipboard },
        { readClipboard: () => clipboard.read(), prompt: ask }
      );
      if (options.fromClipboard && !directoryArg) {
        console.log(`\n📋 Directory from clipboard: ${directory}`);
      }

      const renamer = createBatchRenamer(config, { lookup: options.lookup });

      let files: string[];
      try {
        files = await renamer.listCandidates(directory);
      } catch (error) {
        throw new Error(`${directory}: ${errorMessage(error)}`, { cause: error });
      }
      console.log(`\n📁 Found ${files.length} PDF files in ${directory}`);
      if (files.length === 0) return;

      if (!options.yes) {
        const confirm = await ask('\nDo you want to proceed with processing the files? (y/n): ');
        if (confirm.toLowerCase() !== 'y') {
          console.log('\nProcessing canceled.');
          return;
        }
      }

      const summary = await renamer.process(
        { directory },
        {
          verbose: options.verbose,
          maxPages,
          maxFilenameLength,
          writeMetadata: options.writeMetadata,
          dryRun: options.dryRun,
        }
      );

      printSummary(summary, options.dryRun);
      if (summary.failed > 0) process.exitCode = 1;
    } catch (error) {
      console.error('\n❌ Error:', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * Check configuration
 */
program
  .command('config')
  .description('Check pdf-citation-renamer configuration')
  .action(() => {
    console.log('⚙️  Configuration:\n');

    try {
      const config = loadConfig();
      console.log(`  GEMINI_API_KEY: ${config.apiKey ? '✅ Set' : '❌ Not set'}`);
      console.log(`  Model: ${config.model}`);
      console.log(`  Max pages: ${config.maxPages}`);
      console.log(`  Max filename length: ${config.maxFilenameLength}`);
      console.log(`  Crossref: ${config.crossref.baseUrl}`);
      console.log(`  Crossref mailto: ${config.crossref.mailto ?? '⚠️  Not set (public pool)'}`);

      if (!config.apiKey) {
        console.log('\n❌ GEMINI_API_KEY is required!');
        console.log('   Then set it in .env file');
      }
    } catch (error) {
      console.error(`\n❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error('\n❌ Error:', errorMessage(error));
  process.exit(1);
});
