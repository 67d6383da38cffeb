/**
 * Progress text
 *
 * Human-readable lines for pipeline events and file reports.
 */

import { basename } from 'node:path';
import { formatBytes, formatSeconds } from '@scenecut/utils';
import type { FileReport, PipelineEvent, PipelineStage } from '@scenecut/pipeline';

const STAGE_LABELS: Record<PipelineStage, string> = {
  validate: 'checking file',
  probe: 'reading metadata',
  detect: 'detecting scenes',
  plan: 'planning clips',
  extract: 'extracting clips',
};

/**
 * Spinner text for an event, or undefined for events that do not change it
 */
export function describeEvent(event: PipelineEvent): string | undefined {
  switch (event.type) {
    case 'file-start':
      return `[${event.position}/${event.total}] ${basename(event.inputPath)}`;
    case 'stage':
      return `${basename(event.inputPath)}: ${STAGE_LABELS[event.stage]}`;
    case 'clip':
      return `${basename(event.inputPath)}: clip ${event.result.interval.index}/${event.plannedClips}`;
    default:
      return undefined;
  }
}

export function formatReportLine(report: FileReport): string {
  const name = basename(report.inputPath);

  if (!report.succeeded) {
    return `${name}: failed while ${STAGE_LABELS[report.failedStage ?? 'validate']}: ${report.error ?? 'unknown error'}`;
  }

  const written = report.clips.filter(clip => clip.succeeded);
  const bytes = written.reduce((sum, clip) => sum + clip.sizeBytes, 0);
  const strategy = report.detection ? ` via ${report.detection.strategy}` : '';

  return `${name}: ${written.length}/${report.plannedClips} clips${strategy} (${formatBytes(bytes)}, ${formatSeconds(report.durationMs / 1000, 1)})`;
}

/**
 * One line per clip that did not make it, for reports that otherwise succeeded
 */
export function describeClipFailures(report: FileReport): string[] {
  const lines: string[] = [];
  for (const clip of report.clips) {
    if (!clip.succeeded) {
      lines.push(`clip ${clip.interval.index}: ${clip.error}`);
    }
  }
  return lines;
}
