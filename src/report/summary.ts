import type { OutcomeBucket, ScenarioReport, TestCaseSummary } from '../suite';

export type SummaryOptions = {
  /**
   * Also list passed and skipped cases. Failed and errored cases are always
   * listed.
   *
   * @default false
   */
  verbose?: boolean;
};

type Section = {
  title: string;
  bucket: OutcomeBucket;
  alwaysListed: boolean;
};

export function formatDuration(durationMs: number): string {
  return `${durationMs.toFixed(3)} ms`;
}

function formatCase(testCase: TestCaseSummary): string[] {
  const label = testCase.label || '(anonymous)';
  const lines = [`    [${label}] [${formatDuration(testCase.durationMs)}]`];

  if (testCase.message) {
    const [first, ...rest] = testCase.message.split('\n');
    lines.push(`    Message: ${first}`, ...rest.map(line => `    ${line}`));
  }
  return lines;
}

/**
 * Renders a scenario report as plain text.
 *
 * ```text
 * SUMMARY [Math] [0.250 ms]:
 *   PASSED: 1/2
 *   FAILED: 1/2
 *     [divides] [0.125 ms]
 *     Message: Expected values to be equal
 *       [REACHED] 3
 *       [EXPECTED EQUAL TO] 2
 * ```
 *
 * Counts are out of the registered cases, so a case appended after the run
 * shows up in the denominator only. Sections with no cases are omitted. A
 * scenario that has not run yet renders its header followed by
 * `  NOT RUN YET`.
 */
export function formatScenarioSummary(
  report: ScenarioReport,
  options: SummaryOptions = {}
): string {
  const verbose = options.verbose ?? false;
  const lines = [`SUMMARY [${report.name}] [${formatDuration(report.durationMs)}]:`];

  if (report.state === 'pending') {
    lines.push('  NOT RUN YET');
    return lines.join('\n');
  }

  const sections: Section[] = [
    { title: 'PASSED', bucket: report.passed, alwaysListed: false },
    { title: 'FAILED', bucket: report.failed, alwaysListed: true },
    { title: 'SKIPPED', bucket: report.skipped, alwaysListed: false },
    { title: 'ERRORS', bucket: report.errored, alwaysListed: true }
  ];

  for (const { title, bucket, alwaysListed } of sections) {
    if (bucket.count === 0) continue;

    lines.push(`  ${title}: ${bucket.count}/${report.registeredCount}`);
    if (alwaysListed || verbose) {
      lines.push(...bucket.cases.flatMap(formatCase));
    }
  }

  return lines.join('\n');
}
