import { describe, expect, it } from 'vitest';
import { IndeedAdapter, indeedRssUrl, indeedSearchUrl, parseIndeedHtml, parseIndeedRss } from './indeed';
import { fakeFetch, testContext } from './test-helpers';

const SEARCH_PAGE = `
<html><body>
  <div class="job_seen_beacon">
    <h2 class="jobTitle"><a href="/viewjob?jk=abc123"><span title="Asset Manager Immobilier">Asset Manager Immobilier</span></a></h2>
    <span class="companyName">Foncière Lyonnaise</span>
    <div class="companyLocation">Paris 8e</div>
    <div class="job-snippet"><ul><li>Gestion d'un portefeuille de bureaux</li></ul></div>
  </div>
  <div class="job_seen_beacon">
    <a class="jcs-JobTitle" href="https://fr.indeed.com/rc/clk?jk=def456"><span>Analyste investissement</span></a>
  </div>
  <div class="job_seen_beacon"><p>No title here</p></div>
</body></html>`;

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Indeed</title>
    <link>https://fr.indeed.com</link>
    <description>Offres</description>
    <item>
      <title>Gestionnaire locatif immobilier - Foncia</title>
      <link>https://fr.indeed.com/viewjob?jk=111</link>
      <description><![CDATA[Gestion de biens<br/>Location: Lyon 3e<br/>]]></description>
    </item>
    <item>
      <title>Property Manager</title>
      <link>https://fr.indeed.com/viewjob?jk=222</link>
      <description>Paris office</description>
    </item>
  </channel>
</rss>`;

describe('parseIndeedHtml', () => {
  it('extracts cards with selector fallbacks', () => {
    expect(parseIndeedHtml(SEARCH_PAGE)).toEqual([
      {
        title: 'Asset Manager Immobilier',
        company: 'Foncière Lyonnaise',
        location: 'Paris 8e',
        description: "Gestion d'un portefeuille de bureaux",
        url: 'https://fr.indeed.com/viewjob?jk=abc123',
        source: 'Indeed',
      },
      {
        title: 'Analyste investissement',
        url: 'https://fr.indeed.com/rc/clk?jk=def456',
        source: 'Indeed',
      },
    ]);
  });

  it('returns nothing for a page without cards', () => {
    expect(parseIndeedHtml('<html><body><p>Captcha</p></body></html>')).toEqual([]);
  });
});

describe('parseIndeedRss', () => {
  it('splits company from title and reads the location from the description', async () => {
    const listings = await parseIndeedRss(RSS_FEED);

    expect(listings).toHaveLength(2);
    expect(listings[0]).toMatchObject({
      title: 'Gestionnaire locatif immobilier',
      company: 'Foncia',
      location: 'Lyon 3e',
      url: 'https://fr.indeed.com/viewjob?jk=111',
      source: 'Indeed (RSS)',
    });
    expect(listings[1]).toMatchObject({
      title: 'Property Manager',
      company: undefined,
      location: undefined,
      url: 'https://fr.indeed.com/viewjob?jk=222',
    });
  });
});

describe('IndeedAdapter', () => {
  it('falls back to the RSS feed when the search page has no cards', async () => {
    const fetch = fakeFetch(url => (url.includes('/rss?') ? RSS_FEED : '<html><body></body></html>'));
    const ctx = testContext(fetch);

    const added = await new IndeedAdapter().scrape(ctx);

    expect(added).toBe(2);
    expect(ctx.collection.jobs.map(job => [job.title, job.source])).toEqual([
      ['Gestionnaire locatif immobilier', 'Indeed (RSS)'],
      ['Property Manager', 'Indeed (RSS)'],
    ]);
    expect(fetch).toHaveBeenCalledTimes(8);
    expect(fetch.mock.calls[0][0]).toBe(indeedSearchUrl('investment manager immobilier', 'Paris'));
    expect(fetch.mock.calls[1][0]).toBe(indeedRssUrl('investment manager immobilier', 'Paris'));
  });

  it('uses the search page when it has cards', async () => {
    const fetch = fakeFetch(() => SEARCH_PAGE);
    const ctx = testContext(fetch);

    await new IndeedAdapter().scrape(ctx);

    expect(ctx.collection.jobs.map(job => job.title)).toEqual(['Asset Manager Immobilier', 'Analyste investissement']);
    expect(fetch).toHaveBeenCalledTimes(4);
  });
});

describe('indeedSearchUrl', () => {
  it('encodes the query and location', () => {
    expect(indeedSearchUrl('asset manager immobilier', 'Paris')).toBe(
      'https://fr.indeed.com/emplois?q=asset+manager+immobilier&l=Paris'
    );
  });
});
