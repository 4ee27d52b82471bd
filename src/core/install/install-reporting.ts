import type { StageWarning } from '../../types/index.js';
import { formatTreeLines, formatPathForDisplay } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import type { InstallReport } from './installation-orchestrator.js';

const CHANNEL_LABELS = {
  IndexInstall: 'index',
  LocalArtifactInstall: 'local'
} as const;

export function displayInstallReport(report: InstallReport, output: OutputPort = resolveOutput()): void {
  if (report.dryRun) {
    output.info(`Dry run: ${report.installed.length} installer invocation(s) into ${formatPathForDisplay(report.stagingRoot)}`);
    for (const line of formatTreeLines(report.installed.map(entry => entry.commandLine))) {
      output.message(line);
    }
    return;
  }

  output.success(`Installed ${report.installed.length} package(s) into ${formatPathForDisplay(report.stagingRoot)} (prefix ${report.prefix})`);
  for (const line of formatTreeLines(report.installed.map(entry => `${entry.subject} (${CHANNEL_LABELS[entry.channel]})`))) {
    output.message(line);
  }

  if (report.hostManaged.length > 0) {
    output.info(`Provided by the host package manager: ${report.hostManaged.join(', ')}`);
  }
}

export function displayWarnings(warnings: readonly StageWarning[], output: OutputPort = resolveOutput()): void {
  for (const warning of warnings) {
    output.warn(`[${warning.stage}] ${warning.message}`);
  }
}
