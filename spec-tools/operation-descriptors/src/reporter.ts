import * as fs from 'fs';
import chalk from 'chalk';
import { OperationGroupDefinition } from '../../../sdks/runtime/typescript';
import { ValidationIssue, ValidationResult } from './types';

export class Reporter {
  constructor(private verbose: boolean = false) {}

  public reportToConsole(result: ValidationResult, specFile: string): void {
    console.log(chalk.bold('\n🔍 Operation Descriptor Validation'));
    console.log(chalk.gray(`Analyzed: ${specFile}`));
    console.log(chalk.gray(`Groups: ${result.summary.groups.map((group) => group || '(client)').join(', ')}`));
    console.log(chalk.gray(`Operations: ${result.summary.operationCount}`));

    if (this.verbose) {
      console.log(chalk.gray(`Pageable: ${result.summary.pageableOperations.join(', ') || 'none'}`));
      console.log(chalk.gray(`Long running: ${result.summary.longRunningOperations.join(', ') || 'none'}`));
    }

    if (result.totalIssues === 0) {
      console.log(chalk.green('✅ No issues found! All next operations resolve and every poller has a verb.'));
      return;
    }

    console.log(chalk.red(`\n❌ Found ${result.totalIssues} issues:`));
    console.log(chalk.red(`   Errors: ${result.errorCount}`));
    console.log(chalk.yellow(`   Warnings: ${result.warningCount}`));

    const issuesByType = result.issues.reduce<Record<string, ValidationIssue[]>>((acc, issue) => {
      (acc[issue.type] ??= []).push(issue);
      return acc;
    }, {});

    Object.entries(issuesByType).forEach(([type, issues]) => {
      console.log(chalk.bold(`\n📋 ${this.formatIssueType(type)} (${issues.length}):`));

      issues.forEach((issue) => {
        const severityIcon = issue.severity === 'error' ? '🚨' : '⚠️';
        console.log(`   ${severityIcon} ${issue.message}`);

        if (this.verbose) {
          console.log(chalk.gray(`      Location: ${issue.location}`));
        }
      });
    });

    console.log(chalk.gray('\n💡 Tip: Use --verbose for the list of pageable and long running operations'));
  }

  public reportToJson(result: ValidationResult, specFile: string, outputPath: string): void {
    const report = {
      timestamp: new Date().toISOString(),
      specFile,
      summary: {
        totalIssues: result.totalIssues,
        errorCount: result.errorCount,
        warningCount: result.warningCount,
        groups: result.summary.groups,
        operationCount: result.summary.operationCount
      },
      findings: {
        pageableOperations: result.summary.pageableOperations,
        longRunningOperations: result.summary.longRunningOperations
      },
      issues: result.issues.map(issue => ({
        type: issue.type,
        severity: issue.severity,
        message: issue.message,
        location: issue.location
      }))
    };

    fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
    console.log(`📄 JSON report written to: ${outputPath}`);
  }

  public writeDescriptors(groups: readonly OperationGroupDefinition[], outputPath: string): void {
    fs.writeFileSync(outputPath, JSON.stringify(groups, null, 2));
    console.log(`📦 Operation descriptors written to: ${outputPath}`);
  }

  private formatIssueType(type: string): string {
    const typeNames: Record<string, string> = {
      'unresolved-next-operation': 'Unresolved Next Operations',
      'invalid-long-running-verb': 'Invalid Long Running Verbs',
      'next-operation-without-parameters': 'Next Operations Without Parameters',
      'grouped-field-mismatch': 'Grouped Field Mismatches',
      'pageable-and-long-running': 'Pageable And Long Running',
      'duplicate-operation': 'Duplicate Operations'
    };

    return typeNames[type] || type;
  }
}
