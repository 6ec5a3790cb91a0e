/**
 * Source Adapter Tests
 *
 * Quote row validation, adapter configuration and replay of the bundled snapshots.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AdapterFactory } from '../adapters/AdapterFactory';
import { FileReplayAdapter } from '../adapters/FileReplayAdapter';
import { HttpFeedAdapter } from '../adapters/HttpFeedAdapter';
import { TeamResolver } from '../adapters/TeamResolver';
import { parseQuoteRow, parseQuoteRows } from '../adapters/quote-parser';
import { SourceAggregator } from '../src/aggregation/source-aggregator';
import { collectQuotes } from '../src/engine/refresh-cycle';
import { testConfig } from './helpers/test-config';

const REPLAY_DIR = path.join(__dirname, '../data/replay');

function row(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    eventId: 'EV-1',
    homeTeam: 'Tusker',
    awayTeam: 'KCB',
    competition: 'Kenya Premier League',
    kickoff: '2026-10-18T12:00:00Z',
    market: '1x2',
    selection: '1',
    price: 2.1,
    observedAt: '2026-10-18T12:40:00Z',
    minute: 40,
    score: { home: 0, away: 1 },
    ...overrides,
  };
}

describe('Quote parser', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('parses a complete row', () => {
    expect(parseQuoteRow('betika', row())).toEqual({
      sourceId: 'betika',
      fixture: {
        sourceEventId: 'EV-1',
        homeTeam: 'Tusker',
        awayTeam: 'KCB',
        competition: 'Kenya Premier League',
        kickoffTime: new Date('2026-10-18T12:00:00Z'),
      },
      marketType: '1x2',
      selection: '1',
      price: 2.1,
      observedAt: new Date('2026-10-18T12:40:00Z'),
      matchMinute: 40,
      liveScore: { home: 0, away: 1 },
    });
  });

  test('pre-match rows carry no minute or score', () => {
    const quote = parseQuoteRow('betika', row({ minute: undefined, score: null, competition: undefined }));
    expect(quote?.matchMinute).toBeNull();
    expect(quote?.liveScore).toBeNull();
    expect(quote?.fixture.competition).toBe('unknown');
  });

  test('accepts numeric strings for price and event id', () => {
    const quote = parseQuoteRow('betika', row({ price: '2.10', eventId: 4411 }));
    expect(quote?.price).toBe(2.1);
    expect(quote?.fixture.sourceEventId).toBe('4411');
  });

  const invalidRows: Array<[string, Record<string, unknown>]> = [
    ['missing event id', { eventId: undefined }],
    ['price of 1', { price: 1 }],
    ['unparseable price', { price: 'evens' }],
    ['bad kickoff', { kickoff: 'soon' }],
    ['negative minute', { minute: -3 }],
    ['fractional goals', { score: { home: 1.5, away: 0 } }],
    ['empty selection', { selection: ' ' }],
  ];

  test.each(invalidRows)('rejects a row with %s', (_label, overrides) => {
    expect(parseQuoteRow('betika', row(overrides))).toBeNull();
  });

  test('counts skipped rows', () => {
    const result = parseQuoteRows('betika', { quotes: [row(), row({ price: 0.5 }), 'junk'] });
    expect(result.quotes).toHaveLength(1);
    expect(result.skipped).toBe(2);
  });

  test('rejects a payload that is not a list of quotes', () => {
    expect(() => parseQuoteRows('betika', { data: [] })).toThrow(
      '[SOURCE:betika] Unexpected payload structure: expected an array of quotes'
    );
  });
});

describe('AdapterFactory', () => {
  test('creates the enabled sources from the bundled configuration', () => {
    const factory = new AdapterFactory();

    expect(factory.getEnabledSources()).toEqual(['sportpesa', '1xbet']);
    expect(factory.createEnabledAdapters().map(adapter => adapter.getName())).toEqual(['sportpesa', '1xbet']);
  });

  test('refuses disabled and unknown sources', () => {
    const factory = new AdapterFactory();

    expect(() => factory.createAdapter('betika')).toThrow("Source 'betika' is disabled");
    expect(() => factory.createAdapter('mozzart')).toThrow("Source 'mozzart' not found in configuration");
  });

  test('rejects a file without a sources mapping', () => {
    expect(() => AdapterFactory.parse('adapters: []')).toThrow('Invalid sources configuration');
  });

  test('rejects a source entry with an empty body', () => {
    expect(() => AdapterFactory.parse('sources:\n  betika:\n')).toThrow(
      "Invalid sources configuration: source 'betika' must be a mapping with provider and enabled"
    );
  });

  test('rejects a source whose enabled flag is not a boolean', () => {
    expect(() => AdapterFactory.parse('sources:\n  betika:\n    provider: http-feed\n    enabled: yes please\n')).toThrow(
      "Invalid sources configuration: source 'betika' needs enabled: true or false"
    );
  });

  test('leaves unavailable sources out of the adapter list', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sources-'));
    const configPath = path.join(dir, 'sources.yml');
    fs.writeFileSync(configPath, [
      'sources:',
      '  sportpesa:',
      '    provider: file-replay',
      '    enabled: true',
      '    config:',
      `      path: ${path.join(REPLAY_DIR, 'sportpesa.json')}`,
      '  mozzart:',
      '    provider: file-replay',
      '    enabled: true',
      '    config:',
      '      path: missing.json',
      '',
    ].join('\n'));
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    try {
      const adapters = await new AdapterFactory(configPath).createAvailableAdapters();

      expect(adapters.map(adapter => adapter.getName())).toEqual(['sportpesa']);
      expect(warn).toHaveBeenCalledWith('[SOURCE:mozzart] Not available, skipping');
    } finally {
      warn.mockRestore();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('resolves replay paths against the configuration file', async () => {
    const adapter = new AdapterFactory().createAdapter('sportpesa');
    expect(await adapter.isAvailable()).toBe(true);
  });
});

describe('FileReplayAdapter', () => {
  test('replays a snapshot unchanged by default', async () => {
    const adapter = new FileReplayAdapter({ sourceId: 'sportpesa', path: path.join(REPLAY_DIR, 'sportpesa.json') });

    const quotes = await adapter.fetchQuotes(new AbortController().signal);

    expect(quotes).toHaveLength(12);
    expect(quotes[0].observedAt).toEqual(new Date('2026-10-18T14:05:00Z'));
  });

  test('rebases timestamps so the newest quote is observed now', async () => {
    const adapter = new FileReplayAdapter(
      { sourceId: 'sportpesa', path: path.join(REPLAY_DIR, 'sportpesa.json'), rebaseToNow: true },
      () => new Date('2026-10-20T10:00:00Z')
    );

    const [first] = await adapter.fetchQuotes(new AbortController().signal);

    expect(first.observedAt).toEqual(new Date('2026-10-20T10:00:00Z'));
    expect(first.fixture.kickoffTime).toEqual(new Date('2026-10-20T08:55:00Z'));
  });

  test('a missing file fails the fetch', async () => {
    const adapter = new FileReplayAdapter({ sourceId: 'odibets', path: path.join(REPLAY_DIR, 'odibets.json') });

    expect(await adapter.isAvailable()).toBe(false);
    await expect(adapter.fetchQuotes(new AbortController().signal)).rejects.toThrow('Replay file not found');
  });

  test('bundled snapshots aggregate into one view per fixture', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const adapters = ['sportpesa', '1xbet'].map(
      sourceId => new FileReplayAdapter({ sourceId, path: path.join(REPLAY_DIR, `${sourceId}.json`) })
    );

    const { reports, quotes } = await collectQuotes(adapters, 1000);
    const result = new SourceAggregator(testConfig().aggregation, new TeamResolver())
      .aggregate(quotes, new Date('2026-10-18T14:05:30Z'));
    jest.restoreAllMocks();

    expect(reports.map(r => r.status)).toEqual(['ok', 'ok']);
    expect(result.unsupportedDropped).toBe(1);
    expect(result.excluded).toEqual([]);
    expect(result.views.map(v => v.match.matchId)).toEqual([
      'arsenal_vs_chelsea@2026-10-18',
      'gor-mahia_vs_afc-leopards@2026-10-18',
    ]);

    const derby = result.views[1];
    expect(derby.sourceIds).toEqual(['1xbet', 'sportpesa']);
    expect(derby.liveState).toEqual({ minute: 58, score: { home: 1, away: 0 } });
    expect(derby.bestPrices).toHaveLength(7);
    expect(derby.bestPrices.find(p => p.selection === 'home')).toMatchObject({ price: 1.58, sourceId: '1xbet' });
    expect(derby.bestPrices.find(p => p.selection === 'away')).toMatchObject({ price: 7.2, sourceId: 'sportpesa' });
  });
});

describe('HttpFeedAdapter', () => {
  afterEach(() => {
    delete process.env.TEST_FEED_KEY;
    jest.restoreAllMocks();
  });

  test('sends the API key and parses the payload', async () => {
    process.env.TEST_FEED_KEY = 'test-secret';
    const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(new Response(JSON.stringify([row()])));
    const adapter = new HttpFeedAdapter({ sourceId: 'betika', url: 'http://feed.test/quotes', apiKeyEnv: 'TEST_FEED_KEY' });

    const quotes = await adapter.fetchQuotes(new AbortController().signal);

    expect(quotes.map(q => [q.sourceId, q.fixture.sourceEventId, q.price])).toEqual([['betika', 'EV-1', 2.1]]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Accept': 'application/json', 'X-Api-Key': 'test-secret' });
  });

  test('a non-ok response fails the fetch', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response('unavailable', { status: 503, statusText: 'Service Unavailable' })
    );
    const adapter = new HttpFeedAdapter({ sourceId: 'betika', url: 'http://feed.test/quotes' });

    await expect(adapter.fetchQuotes(new AbortController().signal)).rejects.toThrow('Feed error: 503 Service Unavailable');
  });
});
