// Plain-text report for terminal output

import type { Report } from '../types/report.js';

const WIDTH = 58;
const SEP = '─'.repeat(60);

/** Center within the box, extra space on the right */
function center(text: string, width = WIDTH): string {
  if (text.length >= width) return text;
  const left = Math.floor((width - text.length) / 2);
  return ' '.repeat(left) + text + ' '.repeat(width - text.length - left);
}

/** "2026-03-01T09:30:12.000Z" → "2026-03-01 09:30" (UTC) */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

export function renderReport(report: Report): string {
  const lines: string[] = [
    '',
    '╔' + '═'.repeat(WIDTH) + '╗',
    `║${center('MARKET INTELLIGENCE REPORT')}║`,
    `║${center(`Topic: ${report.topic}`)}║`,
    `║${center(formatTimestamp(report.generatedAt))}║`,
    '╚' + '═'.repeat(WIDTH) + '╝',
    '',
    '📰 LATEST NEWS',
    SEP,
  ];

  for (const a of report.articles) {
    lines.push(
      `  • ${a.headline}`,
      `    Source : ${a.source}`,
      `    Summary: ${a.summary}`,
      '',
    );
  }

  lines.push('📈 MARKET TRENDS', SEP);
  for (const t of report.trends.trends) lines.push(`  • ${t}`);
  lines.push('', '  Sentiment Shifts:');
  for (const s of report.trends.sentimentShifts) lines.push(`  ↳ ${s}`);
  lines.push('');

  lines.push('💡 STRATEGIC OPPORTUNITIES', SEP);
  for (const o of report.strategy.opportunities) lines.push(`  ✦ ${o}`);
  lines.push('', '  Recommendations:');
  for (const r of report.strategy.recommendations) lines.push(`  → ${r}`);
  lines.push('');

  lines.push('⚠️  RISKS & SIGNALS', SEP, '  Market Risks:');
  for (const r of report.risks.risks) lines.push(`  ✗ ${r}`);
  lines.push('', '  Weak Signals:');
  for (const w of report.risks.weakSignals) lines.push(`  ~ ${w}`);
  lines.push('', '  Uncertainties:');
  for (const u of report.risks.uncertainties) lines.push(`  ? ${u}`);
  lines.push('');

  if (report.voiceScript) {
    lines.push('🎙️  VOICE BRIEFING', SEP, report.voiceScript, '');
  }

  lines.push('═'.repeat(60), '  End of Report', '═'.repeat(60), '');
  return lines.join('\n');
}
