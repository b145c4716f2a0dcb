import { describe, expect, it } from 'vitest';
import { isExcluded, isRelevant, VOCABULARY } from './filters';

describe('isRelevant', () => {
  it('accepts a core term in the title', () => {
    expect(isRelevant('Agent Immobilier')).toBe(true);
    expect(isRelevant('REAL ESTATE Associate')).toBe(true);
  });

  it('accepts a job title backed by a property type in the description', () => {
    expect(isRelevant('Senior Broker', 'Office building leasing')).toBe(true);
    expect(isRelevant('Senior Broker')).toBe(false);
  });

  it('accepts a property type with an activity', () => {
    expect(isRelevant('Retail Leasing Coordinator')).toBe(true);
  });

  it('accepts an investment term in the title', () => {
    expect(isRelevant('Debt Analyst')).toBe(true);
  });

  it('needs two weak signals in the title', () => {
    expect(isRelevant('Wealth Capital Coordinator')).toBe(true);
    expect(isRelevant('Capital Coordinator')).toBe(false);
  });

  it('counts a term listed twice in the vocabulary twice', () => {
    expect(isRelevant('Commercial Coordinator')).toBe(true);
  });

  it('accepts a core term in the description with an activity in the title', () => {
    expect(isRelevant('Chargé de location', 'Agence immobilière à Lyon')).toBe(true);
    expect(isRelevant('Chargé de location')).toBe(false);
  });

  it('accepts three vocabulary hits in the description', () => {
    expect(isRelevant('Chef de projet', 'Office notarial: vente et achat de biens immobiliers')).toBe(true);
    expect(isRelevant('Chef de projet')).toBe(false);
  });

  it('rejects a single weak signal', () => {
    expect(isRelevant('Notaire')).toBe(false);
  });

  it('rejects unrelated listings', () => {
    expect(isRelevant('Développeur Full Stack', 'React et Node')).toBe(false);
  });

  it('rejects empty input', () => {
    expect(isRelevant('', '')).toBe(false);
    expect(isRelevant(null, undefined)).toBe(false);
    expect(isRelevant('Random Title With No Keywords', '')).toBe(false);
  });

  it('rejects a software title with no real-estate signal', () => {
    expect(isRelevant('Software Engineer')).toBe(false);
  });

  it('accepts Asset Manager without a description', () => {
    expect(isRelevant('Asset Manager')).toBe(true);
  });

  it('accepts every core term on its own, whatever the description', () => {
    for (const term of VOCABULARY.coreTerms) {
      expect(isRelevant(term), term).toBe(true);
      expect(isRelevant(`Poste ${term.toUpperCase()} Paris`, 'Développeur React'), term).toBe(true);
    }
  });

  it('is case-insensitive', () => {
    expect(isRelevant('agent immobilier')).toBe(isRelevant('AGENT IMMOBILIER'));
  });
});

describe('isExcluded', () => {
  it('matches excluded keywords in the title or company', () => {
    expect(isExcluded({ title: 'Stage Agent Immobilier', company: 'ABC' }, ['stage'])).toBe(true);
    expect(isExcluded({ title: 'Agent Immobilier', company: 'Interim Plus' }, ['INTERIM'])).toBe(true);
  });

  it('keeps everything when no keyword is given', () => {
    expect(isExcluded({ title: 'Stage Agent Immobilier' }, [])).toBe(false);
    expect(isExcluded({ title: 'Agent Immobilier', company: 'ABC' }, ['stage'])).toBe(false);
  });
});
