import pc from 'picocolors';
import type { HarnessReport } from '@examplecheck/core';

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(report: HarnessReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report));
    } else {
      this.renderHuman(report);
    }
  }

  private renderHuman(report: HarnessReport): void {
    const count = report.checked.length;
    console.log(
      `\n${pc.green(`✅ ${count} example${count === 1 ? '' : 's'} checked for ${report.target}.`)}`,
    );

    console.log(pc.bold('\nExamples:'));
    for (const check of report.checked) {
      console.log(`  ${pc.green('✓')} ${check.example} ${pc.gray(`(${formatDuration(check.durationMs)})`)}`);
    }

    console.log(pc.bold('\nRun:'));
    console.log(`  Run ID: ${report.runId}`);
    console.log(`  Duration: ${formatDuration(report.durationMs)}`);
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
