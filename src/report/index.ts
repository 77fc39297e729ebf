import fs from 'fs';
import path from 'path';
import { CsvExporter } from './csv-exporter';
import { MarkdownReportRenderer, formatDate } from './markdown-renderer';
import { RadarReport, ReportFiles } from './types';

export function reportBaseName(date: Date): string {
  return `radar_${formatDate(date)}`;
}

/**
 * 写出 radar_YYYY-MM-DD.md 和 .csv，同一天重复运行时覆盖
 */
export function writeReportFiles(report: RadarReport, outputDir: string): ReportFiles {
  fs.mkdirSync(outputDir, { recursive: true });
  const baseName = reportBaseName(report.generatedAt);
  const markdownPath = path.join(outputDir, `${baseName}.md`);
  const csvPath = path.join(outputDir, `${baseName}.csv`);

  fs.writeFileSync(markdownPath, new MarkdownReportRenderer().render(report), 'utf-8');
  new CsvExporter().writeCsv(report.items, csvPath);

  return { markdownPath, csvPath };
}

export { CsvExporter, CSV_COLUMNS, escapeCsvField } from './csv-exporter';
export { MarkdownReportRenderer, escapeCell, formatDate } from './markdown-renderer';
export * from './types';
