#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import { loadOperationGroups, readOpenApiDocument } from './loader';
import { Reporter } from './reporter';
import { validateOperationGroups } from './validator';

interface ProgramOptions {
  verbose?: boolean;
  output?: string;
  report?: string;
}

const program = new Command();

program
  .name('operation-descriptors')
  .description('Build and validate operation descriptors from an OpenAPI document')
  .version('1.0.0')
  .argument('<spec-file>', 'Path to the OpenAPI document (YAML or JSON)')
  .option('-v, --verbose', 'List pageable and long running operations and issue locations')
  .option('-o, --output <path>', 'Path for the descriptor JSON file', 'operation-descriptors.json')
  .option('-r, --report <path>', 'Path for a JSON validation report')
  .action(async (specFile: string, options: ProgramOptions) => {
    try {
      await runBuild(specFile, options);
    } catch (error) {
      console.error('❌ Descriptor build failed:', error);
      process.exit(1);
    }
  });

async function runBuild(specFile: string, options: ProgramOptions): Promise<void> {
  const specPath = path.resolve(specFile);
  if (!fs.existsSync(specPath)) {
    throw new Error(`Specification file not found: ${specFile}`);
  }

  console.log(chalk.blue('🚀 Reading operation descriptors...'));
  console.log(chalk.gray(`📁 Spec file: ${specPath}`));

  const groups = loadOperationGroups(readOpenApiDocument(specPath));

  console.log(chalk.blue('🔍 Validating next operations and pollers...'));
  const result = validateOperationGroups(groups);

  const reporter = new Reporter(options.verbose);
  reporter.reportToConsole(result, specPath);
  if (options.report) {
    reporter.reportToJson(result, specPath, path.resolve(options.report));
  }

  if (result.errorCount > 0) {
    console.log(chalk.red(`\n💥 Exiting with error code due to ${result.errorCount} error(s)`));
    process.exit(1);
  }

  reporter.writeDescriptors(groups, path.resolve(options.output || 'operation-descriptors.json'));

  if (result.warningCount > 0) {
    console.log(chalk.yellow(`\n⚠️  Completed with ${result.warningCount} warning(s)`));
  } else {
    console.log(chalk.green('\n✅ Descriptors built with no issues!'));
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason, promise) => {
  console.error('❌ Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

program.parse(process.argv);
