#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { buildConfig, CliOptions } from './config.js';
import { BaselineError, ConfigError } from './errors.js';
import { BaselineService } from './services/baseline.js';
import { S3Service } from './services/s3.js';
import { IdentityService } from './services/sts.js';
import { RunReport } from './types/index.js';

interface CommandOptions extends CliOptions {
  json?: boolean;
  output?: string;
}

function printChanges(report: RunReport, showPolicy: boolean, showLogging: boolean): void {
  const rule = chalk.gray('='.repeat(80));

  for (const outcome of report.outcomes) {
    const sections: Array<[string, unknown, unknown]> = [];
    if (showPolicy && outcome.policy.final !== 'Skipped' && outcome.policy.initial !== 'Error') {
      sections.push(['bucket policy', outcome.policy.current, outcome.policy.proposed]);
    }
    if (showLogging && outcome.logging.final !== 'Skipped' && outcome.logging.initial !== 'Error') {
      sections.push(['access logging', outcome.logging.current, outcome.logging.proposed]);
    }

    for (const [label, current, proposed] of sections) {
      console.log(rule);
      console.log(chalk.blue(`${outcome.bucket}: ${label}`));
      console.log(rule);
      console.log(chalk.yellow('[current]'));
      console.log(current ? JSON.stringify(current, null, 2) : chalk.gray('(none)'));
      console.log(chalk.yellow('[proposed]'));
      console.log(proposed ? JSON.stringify(proposed, null, 2) : chalk.gray('(none)'));
    }
  }
}

const program = new Command();

program
  .name('s3-secure-baseline')
  .description('Enforce a deny-insecure-transport bucket policy and access logging on every S3 bucket (dry run by default)')
  .version('1.0.0')
  .option('--apply', 'Write changes (default is a dry run)')
  .option('-b, --bucket <name>', 'Process only this bucket')
  .option('-p, --profile <name>', 'AWS profile to use')
  .option('-r, --region <region>', 'AWS region (defaults to AWS_REGION, then the profile)')
  .option('-e, --exclude <names...>', 'Buckets to leave untouched (repeatable)', [])
  .option('--show-policy', 'Print current and proposed bucket policies')
  .option('--show-logging', 'Print current and proposed access logging settings')
  .option('--policy-only', 'Only reconcile the deny-insecure-transport policy')
  .option('--logging-only', 'Only reconcile access logging')
  .option('-c, --concurrency <number>', 'Buckets to process in parallel (1-10)', '1')
  .option('--json', 'Output the run report as JSON')
  .option('-o, --output <file>', 'Output file for the report (default: console)')
  .action(async (options: CommandOptions) => {
    try {
      const config = buildConfig(options);

      console.log(chalk.blue('🔒 S3 Secure Baseline'));
      console.log(chalk.gray('======================================'));
      if (config.dryRun) {
        console.log(chalk.yellow('DRY RUN: no changes will be made. Use --apply to write changes.'));
      } else {
        console.log(chalk.red('APPLY: changes will be written to your buckets.'));
      }
      if (config.policyOnly) {
        console.log(chalk.yellow('Reconciling the deny-insecure-transport policy only (access logging skipped)'));
      } else if (config.loggingOnly) {
        console.log(chalk.yellow('Reconciling access logging only (bucket policy skipped)'));
      }
      if (config.profile) {
        console.log(chalk.yellow(`Profile: ${config.profile}`));
      }
      if (config.region) {
        console.log(chalk.yellow(`Region: ${config.region}`));
      }
      if (config.excludeBuckets.length > 0) {
        console.log(chalk.yellow(`Excluded buckets: ${config.excludeBuckets.join(', ')}`));
      }
      console.log();

      const credentials = { region: config.region, profile: config.profile };
      const service = new BaselineService(new IdentityService(credentials), new S3Service(credentials));

      const controller = new AbortController();
      process.once('SIGINT', () => {
        console.warn(chalk.yellow('\nInterrupted: finishing the current bucket before stopping'));
        controller.abort();
      });

      const report = await service.run(config, { signal: controller.signal });

      printChanges(report, config.showPolicy, config.showLogging);

      const output = options.json ? JSON.stringify(report, null, 2) : service.generateReport(report);

      if (options.output) {
        const outputPath = join(process.cwd(), options.output);
        writeFileSync(outputPath, output, 'utf8');
        console.log(chalk.green(`✅ Report saved to: ${outputPath}`));
      } else {
        console.log(output);
      }

      const failed = report.outcomes.filter(outcome => outcome.status !== 'success');

      if (report.notFound.length > 0) {
        console.error(chalk.red(`❌ ${report.notFound.map(entry => entry.bucket).join(', ')} could not be processed`));
        process.exit(1);
      }

      if (report.aborted) {
        console.error(chalk.red('❌ Run interrupted before all buckets were processed'));
        process.exit(1);
      }

      if (!config.dryRun && failed.length > 0) {
        console.error(chalk.red(`❌ ${failed.length} bucket(s) did not reach the baseline`));
        process.exit(1);
      }

      if (config.dryRun) {
        console.log(chalk.green(`✅ ${service.describeDryRun(report)}`));
      } else {
        console.log(chalk.green('✅ All buckets meet the baseline'));
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(chalk.red(`Error: ${error.message}`));
        process.exit(1);
      }

      console.error(chalk.red('❌ Baseline run failed:'));

      if (error instanceof BaselineError) {
        console.error(chalk.red(`[${error.code}] ${error.message}`));

        if (error.message.includes('AccessDenied') || error.message.includes('credentials')) {
          console.log();
          console.log(chalk.yellow('💡 Suggestions:'));
          console.log(chalk.yellow('  - Check your AWS credentials and the selected profile'));
          console.log(chalk.yellow('  - Ensure you may list, read and write S3 bucket policies and logging'));
          console.log(chalk.yellow('  - Try running: aws sts get-caller-identity'));
        }
      } else if (error instanceof Error) {
        console.error(chalk.red(error.message));
      } else {
        console.error(chalk.red('Unknown error occurred'));
      }

      process.exit(1);
    }
  });

program.on('--help', () => {
  console.log();
  console.log('Examples:');
  console.log();
  console.log('  # Audit every bucket without changing anything');
  console.log('  $ s3-secure-baseline');
  console.log();
  console.log('  # Apply the baseline to every bucket except two');
  console.log('  $ s3-secure-baseline --apply -e legacy-bucket -e vendor-drop');
  console.log();
  console.log('  # Preview the policy change for a single bucket');
  console.log('  $ s3-secure-baseline -b my-bucket --show-policy --policy-only');
  console.log();
  console.log('  # Save a JSON report using a named profile');
  console.log('  $ s3-secure-baseline -p audit --json -o baseline-report.json');
  console.log();
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error occurred'));
  process.exit(1);
});
