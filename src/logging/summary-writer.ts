import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunSummary } from '../runner/orchestrator.js';

export async function writeSummary(runDir: string, summary: RunSummary): Promise<string> {
  await mkdir(runDir, { recursive: true });
  const filePath = join(runDir, 'summary.md');
  await writeFile(filePath, buildSummaryMarkdown(summary), 'utf-8');
  return filePath;
}

export function buildSummaryMarkdown(summary: RunSummary): string {
  const passed = summary.artifacts.filter((a) => a.outcome.ok).length;
  const total = summary.artifacts.length + summary.skippedNodes.length;
  let result = 'Success';
  if (summary.cancelled) {
    result = 'Cancelled';
  } else if (summary.failedNodes.length > 0 || summary.skippedNodes.length > 0) {
    result = 'Partial Failure';
  }

  const lines: string[] = [
    '# Evaluation Summary',
    `- Target: ${summary.target}`,
    `- Result: ${result}`,
    `- Duration: ${formatDuration(summary.durationMs)}`,
    `- Nodes: ${passed}/${total} passed`,
    '',
    '## Nodes',
  ];

  for (const artifact of summary.artifacts) {
    if (artifact.outcome.ok) {
      lines.push(`- ${artifact.nodeId}: ok (${artifact.messages.length} messages)`);
    } else {
      lines.push(`- ${artifact.nodeId}: failed - ${artifact.outcome.failure.message}`);
    }
  }
  for (const nodeId of summary.skippedNodes) {
    lines.push(`- ${nodeId}: no result`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${summary.runId}`);
  lines.push(`- Started at: ${summary.startedAt}`);

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
