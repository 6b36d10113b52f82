import type { RunSummary } from "../core/types.js";

export interface ProgressClock {
  total: number;
  startTime: number;
}

export function startProgress(total: number): ProgressClock {
  return { total, startTime: Date.now() };
}

/** One status line: counts, percentage and ETA from the average rate so far. */
export function formatProgress(
  done: number,
  total: number,
  elapsedSeconds: number,
): string {
  const pct = total > 0 ? ((done / total) * 100).toFixed(1) : "100.0";
  const rate = elapsedSeconds > 0 ? done / elapsedSeconds : 0;
  const eta = rate > 0 ? (total - done) / rate : 0;
  return `[${done}/${total}] ${pct}% | ETA: ${formatDuration(eta)}`;
}

export function printProgress(clock: ProgressClock, done: number): void {
  const elapsed = (Date.now() - clock.startTime) / 1000;
  process.stdout.write(`\r${formatProgress(done, clock.total, elapsed)}${"".padEnd(10)}`);
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    "=== Run Complete ===",
    `  Directory:  ${summary.directory}`,
    `  Discovered: ${summary.discovered}`,
    `  Skipped:    ${summary.skipped} (already marked)`,
    `  Processed:  ${summary.processed} in ${summary.batches} batch(es)`,
    `  Tagged:     ${summary.outcomes.tagged}`,
    `  Unpopular:  ${summary.outcomes.unpopular}`,
    `  Unknown:    ${summary.outcomes.unknown}`,
    `  Errors:     ${summary.errors.length}`,
    `  Duration:   ${formatDuration(summary.durationMs / 1000)}`,
  ];
  for (const error of summary.errors) {
    lines.push(`    ${error.fileName} (${error.stage}): ${error.message}`);
  }
  return lines;
}

export function printSummary(summary: RunSummary): void {
  console.log("\n");
  for (const line of formatSummary(summary)) console.log(line);
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const m = Math.floor(seconds / 60);
  const s = Math.round(seconds % 60);
  if (m < 60) return `${m}m ${s}s`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return `${h}h ${rm}m`;
}
