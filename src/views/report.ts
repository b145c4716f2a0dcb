import path from 'path';
import { countBySource, topTitleWords } from './jobs';
import type { JobRecord } from '../scrapers/types';

const REPORT_THRESHOLD = 50;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `report_<output without extension>.txt`, beside the output. */
export function reportName(output: string): string {
  const parsed = path.parse(output);
  return path.join(parsed.dir, `report_${parsed.name}.txt`);
}

export function shouldWriteReport(requested: boolean, jobCount: number): boolean {
  return requested || jobCount > REPORT_THRESHOLD;
}

export function buildReport(jobs: readonly JobRecord[], runtimeMs: number, now: Date = new Date()): string {
  const lines = [
    `Job Scraping Report - ${formatTimestamp(now)}`,
    '==========================================================',
    '',
    `Total jobs collected: ${jobs.length}`,
    '',
    'Jobs by source:',
  ];

  for (const [source, count] of Object.entries(countBySource(jobs))) {
    lines.push(`  - ${source}: ${count} jobs`);
  }

  lines.push('', 'Most common keywords in job titles:');
  for (const { word, count } of topTitleWords(jobs)) {
    lines.push(`  - ${word}: ${count} occurrences`);
  }

  lines.push('', `Total runtime: ${(runtimeMs / 1000).toFixed(2)} seconds`);
  return `${lines.join('\n')}\n`;
}
