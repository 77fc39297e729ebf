/**
 * CSV导出测试
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { CsvExporter, CSV_COLUMNS, escapeCsvField } from '../../src/report/csv-exporter';
import { MarkdownReportRenderer } from '../../src/report/markdown-renderer';
import { writeReportFiles, reportBaseName } from '../../src/report';
import { PLAIN_ITEM, TOP_ITEM, sampleReport } from './fixtures';

describe('CSV导出测试', () => {
  test('应该按RFC 4180转义字段', () => {
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(12.5)).toBe('12.5');
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });

  test('应该输出表头和每个商品一行', () => {
    const quoted = { ...TOP_ITEM, product: { ...TOP_ITEM.product, name: 'Glow "Serum", 30ml' } };
    const lines = new CsvExporter().toCsv([quoted, PLAIN_ITEM]).split('\r\n');

    expect(lines).toEqual([
      CSV_COLUMNS.join(','),
      '1,p1,"Glow ""Serum"", 30ml",tiktok_shop,Beauty,$19.99,100000,,5.6,1,80.456,70,62.5,84.18,A,emerging,Stop scrolling,Order samples,https://shop.example.com/p1,https://www.tiktok.com/@jane/video/1',
      '2,p2,Body Scrub,tiktok_shop,Body Care,,,,,,40,,,31,C,insufficient_data,,,,',
      ''
    ]);
  });

  test('没有商品时只输出表头', () => {
    expect(new CsvExporter().toCsv([])).toBe(`${CSV_COLUMNS.join(',')}\r\n`);
  });

  test('应该按日期写出两个报告文件', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'radar-report-'));
    const report = sampleReport();

    try {
      const files = writeReportFiles(report, path.join(dir, 'reports'));

      expect(reportBaseName(report.generatedAt)).toBe('radar_2025-10-30');
      expect(files).toEqual({
        markdownPath: path.join(dir, 'reports', 'radar_2025-10-30.md'),
        csvPath: path.join(dir, 'reports', 'radar_2025-10-30.csv')
      });
      expect(fs.readFileSync(files.markdownPath, 'utf-8')).toBe(new MarkdownReportRenderer().render(report));
      expect(fs.readFileSync(files.csvPath, 'utf-8')).toBe(new CsvExporter().toCsv(report.items));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
