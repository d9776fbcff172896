import type { RunBackupResult } from '../application/ports/input/run-backup.port';
import { formatBytes, formatDuration } from '../shared/format/format';

/**
 * Final report of a run, one log line per entry
 */
export function formatRunSummary(result: RunBackupResult): string[] {
  const { counts, sweep } = result;
  const lines = [
    `Backup of ${result.date} finished in ${formatDuration(result.durationMs)}`,
    `Exports: ${counts.completed} completed, ${counts.failed} failed, ${counts.timedOut} timed out (of ${counts.total})`,
  ];

  const moved = result.relocated.filter((backup) => backup.status === 'moved');
  const totalBytes = result.relocated.reduce((sum, backup) => sum + backup.sizeBytes, 0);
  lines.push(
    `Backups: ${moved.length} stored, ${result.relocated.length - moved.length} already present, ${formatBytes(totalBytes)} total`,
  );
  lines.push(
    `Cleanup: ${sweep.recordsDeleted.length} export record(s) removed, ${sweep.filesPruned.length} expired backup(s) pruned`,
  );

  if (result.failures.length > 0) {
    lines.push(`${result.failures.length} problem(s):`);
    for (const failure of result.failures) {
      lines.push(`  [${failure.stage}] ${failure.subject}: ${failure.reason}`);
    }
  }

  return lines;
}
