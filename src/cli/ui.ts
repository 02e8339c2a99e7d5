import chalk from 'chalk';
import Table from 'cli-table3';
import { RepositoryReport, RepositoryStatus, RunSummary } from '../types';

export function displaySuccess(message: string, metrics?: Record<string, string | number>): void {
  console.log(chalk.green(`\n✅ ${message}`));
  if (metrics) {
    console.log(chalk.gray('='.repeat(Math.min(message.length + 3, 50))));
    Object.entries(metrics).forEach(([key, value]) => {
      const formattedKey = chalk.cyan(key);
      const formattedValue = typeof value === 'number'
        ? chalk.yellow(value.toLocaleString())
        : chalk.white(value);
      console.log(`${formattedKey}: ${formattedValue}`);
    });
  }
}

export function displayCommandHeader(command: string, description: string): void {
  console.log(chalk.blue(`\n🚀 ${command}`));
  console.log(chalk.gray(description));
  console.log(chalk.gray('-'.repeat(50)));
}

export function displayProgress(message: string): void {
  console.log(chalk.blue(`🔄 ${message}`));
}

function colorStatus(status: RepositoryStatus): string {
  switch (status) {
    case 'completed':
      return chalk.green(status);
    case 'clone-failed':
    case 'invalid-url':
      return chalk.yellow(status);
    case 'failed':
      return chalk.red(status);
  }
}

export function displayRepositoryReports(reports: RepositoryReport[]): void {
  if (reports.length === 0) {
    console.log(chalk.yellow('\n📭 No repositories were mined.'));
    return;
  }

  const table = new Table({
    head: [
      chalk.bold('Repository'),
      chalk.bold('Status'),
      chalk.bold('Branch'),
      chalk.bold('Commits'),
      chalk.bold('Checkout failures'),
      chalk.bold('Violations saved'),
      chalk.bold('Skipped'),
    ],
  });

  for (const report of reports) {
    table.push([
      report.repoUrl,
      colorStatus(report.status),
      report.branch ?? '-',
      `${report.commitsAnalyzed}/${report.commitsTotal}`,
      report.checkoutFailures,
      report.violationsWritten,
      report.violationsSkipped,
    ]);
  }

  console.log(table.toString());
}

export function displayRunSummary(summary: RunSummary, datasetDir: string): void {
  displayRepositoryReports(summary.repositories);
  displaySuccess('Structured mining completed!', {
    Repositories: summary.repositories.length,
    Failed: summary.failedRepositories,
    'Violations saved': summary.totalViolationsWritten,
    Dataset: datasetDir,
    Duration: `${summary.duration}ms`,
  });
}

export function displayRepositoryList(cloneUrls: string[]): void {
  console.log(chalk.green(`\n📋 ${cloneUrls.length} repositories found`));
  cloneUrls.forEach((url, index) => {
    console.log(`${chalk.gray(String(index + 1).padStart(3))}. ${url}`);
  });
}
