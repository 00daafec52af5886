// Renders a naming plan for the terminal or for other tools

import { AlbumPlan } from '../core/album-set';
import { NamingPlanEntry } from '../core/photo-collection';
import { PhotoStatus, worstStatus } from '../core/photo';

export type PlanFormat = 'table' | 'json' | 'csv';

export const SUPPORTED_PLAN_FORMATS: readonly PlanFormat[] = ['table', 'json', 'csv'];

export function isPlanFormat(value: string): value is PlanFormat {
  return SUPPORTED_PLAN_FORMATS.some((format) => format === value);
}

const STATUS_LABELS: Record<PhotoStatus, string> = {
  [PhotoStatus.SAVED]: 'saved',
  [PhotoStatus.READY]: 'ready',
  [PhotoStatus.WARNING_LENGTH]: 'too long',
  [PhotoStatus.ERROR_MINOR]: 'error',
  [PhotoStatus.REFUSE_LENGTH]: 'bad length',
  [PhotoStatus.REFUSE_SYMBOL]: 'bad symbol',
  [PhotoStatus.REFUSE_DUPLICATE]: 'duplicate',
  [PhotoStatus.ERROR_SEVERE]: 'failed',
};

export function statusLabel(status: PhotoStatus): string {
  return STATUS_LABELS[status];
}

function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

function csvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export class NamingPlanReporter {
  static render(entries: readonly NamingPlanEntry[], format: PlanFormat): string {
    switch (format) {
      case 'json':
        return NamingPlanReporter.renderJson(entries);
      case 'csv':
        return NamingPlanReporter.renderCsv(entries);
      case 'table':
        return NamingPlanReporter.renderTable(entries);
    }
  }

  static renderJson(entries: readonly NamingPlanEntry[]): string {
    return JSON.stringify(entries, null, 2);
  }

  static renderCsv(entries: readonly NamingPlanEntry[]): string {
    const lines = ['File Name,Status,Uploaded,Source'];
    for (const entry of entries) {
      lines.push(
        [entry.fileName, entry.status, entry.uploadDate, entry.sourceLocation].map(csvField).join(',')
      );
    }
    return lines.join('\n');
  }

  /**
   * One section per album, then the overall status. CSV gets a leading
   * Album column; JSON is the list of album plans.
   */
  static renderAlbums(plans: readonly AlbumPlan[], format: PlanFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(plans, null, 2);
      case 'csv':
        return NamingPlanReporter.renderAlbumsCsv(plans);
      case 'table':
        return NamingPlanReporter.renderAlbumsTable(plans);
    }
  }

  static renderAlbumsCsv(plans: readonly AlbumPlan[]): string {
    const lines = ['Album,File Name,Status,Uploaded,Source'];
    for (const plan of plans) {
      for (const entry of plan.photos) {
        lines.push(
          [plan.source, entry.fileName, entry.status, entry.uploadDate, entry.sourceLocation]
            .map(csvField)
            .join(',')
        );
      }
    }
    return lines.join('\n');
  }

  static renderAlbumsTable(plans: readonly AlbumPlan[]): string {
    const sections = plans.map((plan) => {
      const heading = `📁 ${plan.source} → ${plan.outputDirectory}`;
      if (plan.error !== undefined) {
        return [heading, `❌ ${plan.error}`].join('\n');
      }
      return [
        heading,
        NamingPlanReporter.renderTable(plan.photos),
        `Photos: ${plan.photos.length}, worst status: ${statusLabel(plan.worstStatus)}`,
      ].join('\n');
    });

    const overall = plans.reduce((acc, plan) => worstStatus(acc, plan.worstStatus), PhotoStatus.READY);
    sections.push(`📊 Albums: ${plans.length}, worst status: ${statusLabel(overall)}`);
    return sections.join('\n\n');
  }

  static renderTable(entries: readonly NamingPlanEntry[]): string {
    const rule = '─'.repeat(100);
    const lines = [
      '#'.padEnd(5) + 'File Name'.padEnd(60) + 'Status'.padEnd(13) + 'Uploaded',
      rule,
    ];

    entries.forEach((entry, position) => {
      lines.push(
        String(position + 1).padEnd(5) +
          truncateText(entry.fileName, 59).padEnd(60) +
          statusLabel(entry.status).padEnd(13) +
          entry.uploadDate
      );
    });

    lines.push(rule);
    return lines.join('\n');
  }
}
