import { describe, expect, it } from 'vitest';
import { filterJobs, jobStats, matchesWindow, sortJobs, toCsv, topTitleWords } from './jobs';
import type { JobRecord } from '../scrapers/types';

function job(overrides: Partial<JobRecord> & { title: string }): JobRecord {
  return {
    company: 'Unknown',
    location: 'Paris',
    source: 'Indeed',
    scraped_date: '2024-05-01',
    ...overrides,
  };
}

const jobs: JobRecord[] = [
  job({ title: 'Asset Manager', company: 'Gecina', source: 'LinkedIn', scraped_date: '2024-04-30', estimated_salary: 70000 }),
  job({ title: 'Agent immobilier', company: 'orpi', source: 'APEC', scraped_date: '2024-04-20' }),
  job({ title: 'Property Manager', company: 'Foncia', description: 'Gestion de copropriétés', scraped_date: '2024-03-01' }),
];

describe('filterJobs', () => {
  it('matches text case-insensitively across fields', () => {
    expect(filterJobs(jobs, { text: 'manager' }).map(j => j.title)).toEqual(['Asset Manager', 'Property Manager']);
    expect(filterJobs(jobs, { text: 'COPROPRIÉTÉS' }).map(j => j.title)).toEqual(['Property Manager']);
    expect(filterJobs(jobs, { text: 'apec' }).map(j => j.title)).toEqual(['Agent immobilier']);
  });

  it('applies the date window against the reference day', () => {
    expect(filterJobs(jobs, { window: '24h', today: '2024-05-01' }).map(j => j.title)).toEqual(['Asset Manager']);
    expect(filterJobs(jobs, { window: '2weeks', today: '2024-05-01' })).toHaveLength(2);
    expect(filterJobs(jobs, { window: 'any', today: '2024-05-01' })).toHaveLength(3);
  });

  it('keeps records with an unreadable date', () => {
    expect(matchesWindow(job({ title: 'Agent', scraped_date: 'hier' }), 'week', '2024-05-01')).toBe(true);
  });
});

describe('sortJobs', () => {
  it('sorts case-insensitively in either direction', () => {
    const ascending = sortJobs(jobs, { key: 'company', ascending: true });
    expect(ascending.map(j => j.company)).toEqual(['Foncia', 'Gecina', 'orpi']);
    const descending = sortJobs(jobs, { key: 'scraped_date', ascending: false });
    expect(descending.map(j => j.scraped_date)).toEqual(['2024-04-30', '2024-04-20', '2024-03-01']);
  });

  it('treats a missing salary as zero and keeps ties in order', () => {
    const sorted = sortJobs(jobs, { key: 'estimated_salary', ascending: false });
    expect(sorted.map(j => j.title)).toEqual(['Asset Manager', 'Agent immobilier', 'Property Manager']);
  });
});

describe('toCsv', () => {
  it('quotes cells that need it and appends extra columns', () => {
    const csv = toCsv([
      job({ title: 'Agent, "senior"', company: 'ABC', url: 'https://example.com/1' }),
      job({ title: 'Asset Manager', company: 'Gecina', estimated_salary: 70000, estimated_fee: 17500 }),
    ]);

    expect(csv.split('\r\n')).toEqual([
      'title,company,location,source,scraped_date,description,url,estimated_salary,estimated_fee',
      '"Agent, ""senior""",ABC,Paris,Indeed,2024-05-01,,https://example.com/1,,',
      'Asset Manager,Gecina,Paris,Indeed,2024-05-01,,,70000,17500',
      '',
    ]);
  });
});

describe('jobStats', () => {
  it('counts sources, salaries and title words', () => {
    expect(jobStats(jobs)).toEqual({
      total: 3,
      bySource: { LinkedIn: 1, APEC: 1, Indeed: 1 },
      topKeywords: [
        { word: 'manager', count: 2 },
        { word: 'asset', count: 1 },
        { word: 'agent', count: 1 },
        { word: 'immobilier', count: 1 },
        { word: 'property', count: 1 },
      ],
      withSalary: 1,
    });
  });

  it('limits the keyword list', () => {
    expect(topTitleWords(jobs, 1)).toEqual([{ word: 'manager', count: 2 }]);
  });
});
