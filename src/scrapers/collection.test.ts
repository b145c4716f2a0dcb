import { describe, expect, it } from 'vitest';
import { isoDate, JobCollection } from './collection';

function newCollection(excludeKeywords: string[] = []) {
  return new JobCollection({ defaultLocation: 'Paris', excludeKeywords, today: () => '2024-05-01' });
}

describe('JobCollection', () => {
  it('fills in defaults for missing fields', () => {
    const collection = newCollection();

    expect(collection.add({ title: 'Agent Immobilier', source: 'APEC' })).toBe('added');
    expect(collection.jobs).toEqual([
      { title: 'Agent Immobilier', company: 'Unknown', location: 'Paris', source: 'APEC', scraped_date: '2024-05-01' },
    ]);
  });

  it('only keeps relevant, non-duplicate listings in insertion order', () => {
    const collection = newCollection();

    const outcomes = [
      collection.add({ title: 'Agent Immobilier', company: 'ABC', location: 'Paris', source: 'Indeed' }),
      collection.add({ title: 'agent immobilier', company: 'ABC', location: 'Paris', source: 'APEC' }),
      collection.add({ title: 'Développeur Full Stack', company: 'Tech', description: 'React et Node', source: 'Indeed' }),
      collection.add({
        title: 'Notaire',
        company: 'Etude Martin',
        description: 'Office notarial: vente et achat de biens immobiliers',
        source: 'APEC',
      }),
      collection.add({ title: 'Agent Immobilier Senior', company: 'ABC', location: 'Paris', source: 'LinkedIn' }),
    ];

    expect(outcomes).toEqual(['added', 'duplicate', 'irrelevant', 'added', 'added']);
    expect(collection.jobs.map(job => job.title)).toEqual(['Agent Immobilier', 'Notaire', 'Agent Immobilier Senior']);
    expect(collection.jobs[1].description).toBe('Office notarial: vente et achat de biens immobiliers');
  });

  it('collapses a relisting with a longer location and rejects a bare Notaire title', () => {
    const collection = newCollection();

    const outcomes = [
      collection.add({ title: 'Agent Immobilier', company: 'ABC', location: 'Paris', source: 'Indeed' }),
      collection.add({ title: 'agent immobilier', company: 'ABC', location: 'Paris, France', source: 'LinkedIn' }),
      collection.add({ title: 'Notaire', company: 'XYZ', location: 'Lyon', source: 'APEC' }),
    ];

    expect(outcomes).toEqual(['added', 'duplicate', 'irrelevant']);
    expect(collection.jobs).toEqual([
      { title: 'Agent Immobilier', company: 'ABC', location: 'Paris', source: 'Indeed', scraped_date: '2024-05-01' },
    ]);
  });

  it('drops listings matching an excluded keyword before classifying them', () => {
    const collection = newCollection(['stage']);

    expect(collection.add({ title: 'Stage Agent Immobilier', company: 'ABC', source: 'APEC' })).toBe('excluded');
    expect(collection.size).toBe(0);
  });

  it('checks new listings against restored records', () => {
    const collection = newCollection();
    collection.restore([
      { title: 'Agent Immobilier', company: 'ABC', location: 'Paris', source: 'APEC', scraped_date: '2024-04-30' },
    ]);

    expect(collection.add({ title: 'AGENT IMMOBILIER', company: 'abc', source: 'Indeed' })).toBe('duplicate');
    expect(collection.size).toBe(1);
  });

  it('finalize removes records sharing a normalized key', () => {
    const collection = newCollection();
    collection.add({ title: 'Responsable de la gestion immobilière', company: 'XYZ', source: 'APEC' });
    collection.add({ title: 'Responsable gestion immobilière', company: 'XYZ', source: 'APEC' });
    expect(collection.size).toBe(2);

    expect(collection.finalize()).toBe(1);
    expect(collection.jobs.map(job => job.title)).toEqual(['Responsable de la gestion immobilière']);

    expect(collection.add({ title: 'responsable de la gestion immobilière', company: 'xyz', source: 'Indeed' })).toBe(
      'duplicate'
    );
  });
});

describe('isoDate', () => {
  it('formats the local date', () => {
    expect(isoDate(new Date(2024, 0, 5, 23, 30))).toBe('2024-01-05');
  });
});
