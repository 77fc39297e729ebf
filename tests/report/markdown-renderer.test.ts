/**
 * Markdown报告测试
 */

import { MarkdownReportRenderer, escapeCell, formatDate } from '../../src/report/markdown-renderer';
import { sampleReport } from './fixtures';

describe('Markdown报告测试', () => {
  const renderer = new MarkdownReportRenderer();

  test('应该格式化本地日期', () => {
    expect(formatDate(new Date(2025, 0, 5, 23, 59))).toBe('2025-01-05');
  });

  test('应该转义表格单元格', () => {
    expect(escapeCell('a|b\n  c ')).toBe('a\\|b c');
  });

  test('应该渲染报告头部', () => {
    const lines = renderer.render(sampleReport()).split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '# Product Trend Radar 2025-10-30',
      '',
      '- Period: 2025-10-23 to 2025-10-30',
      '- Brand: Test Brand',
      '- Collected: ads_intel: 3, trending_api: 0',
      '- Ranked products: 2'
    ]);
  });

  test('应该按优先级和趋势汇总', () => {
    const lines = renderer.render(sampleReport()).split('\n');

    expect(lines).toEqual(expect.arrayContaining(['| A | 1 |', '| B | 0 |', '| C | 1 |']));
    expect(lines).toEqual(expect.arrayContaining(['| Emerging | 1 |', '| Insufficient data | 1 |']));
    expect(lines).not.toContain('| Rising | 0 |');
  });

  test('应该渲染排名表格', () => {
    const lines = renderer.render(sampleReport()).split('\n');

    expect(lines).toContain(
      '| 1 | [Glow \\| Serum](https://shop.example.com/p1) | tiktok_shop | Beauty | 100K | 80.5 | 70.0 | 84.2 | A | Emerging |'
    );
    expect(lines).toContain('| 2 | Body Scrub | tiktok_shop | Body Care | - | 40.0 | - | 31.0 | C | Insufficient data |');
  });

  test('只应该展开前N个商品的详情', () => {
    const markdown = renderer.render(sampleReport());

    expect(markdown).toContain([
      '### 1. Glow | Serum',
      '',
      '- Platform: tiktok_shop · Category: Beauty · Price: $19.99',
      '- Trend score 80.5 (priority A), direction Emerging',
      '- Brand fit 70.0, SSR 62.5',
      '- Videos: 1, ER: 5.6%',
      '- Recommendation: Order samples',
      '- Why it fits: fits skincare',
      '- Hooks: "Stop scrolling"',
      '',
      'Evidence videos:',
      '- https://www.tiktok.com/@jane/video/1 (5K, 25-34 iOS, US, Oct 28 2025)'
    ].join('\n'));
    expect(markdown).not.toContain('### 2. Body Scrub');
  });

  test('应该在末尾列出错误', () => {
    const markdown = renderer.render(sampleReport());
    expect(markdown.endsWith('## Errors\n\n- **collect:vendor**: timeout\n')).toBe(true);
  });

  test('没有商品时应该给出提示', () => {
    const markdown = renderer.render(sampleReport({ items: [], errors: [], collected: {} }));

    expect(markdown).toContain('- Collected: none');
    expect(markdown).toContain('## Ranking\n\nNo products passed the filters in this period.');
    expect(markdown).not.toContain('## Top products');
    expect(markdown).not.toContain('## Errors');
  });
});
