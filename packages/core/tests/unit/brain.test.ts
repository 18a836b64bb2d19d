import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Brain, NO_SOLUTION, createBrain } from '../../src/brain.js';
import { defaultConfig } from '../../src/config-loader.js';
import type { DeskmateConfig } from '../../src/config-loader.js';
import { FormatError, NotFoundError, PersistenceError } from '../../src/errors.js';
import { EventBus } from '../../src/event-bus.js';
import type { Embedder } from '../../src/semantic/embedder.js';
import { UnmatchedLog } from '../../src/unmatched-log.js';
import { NO_WEB_RESULTS } from '../../src/web/web-fallback.js';
import type { FetchLike } from '../../src/web/web-fallback.js';
import { MemoryRepository, sampleRecords } from '../helpers/fixtures.js';

function offlineConfig(): DeskmateConfig {
  const config = defaultConfig();
  config.internet.enabled = false;
  return config;
}

const routerEmbedder: Embedder = {
  async embedTexts(texts) {
    return texts.map((text) => [text.toLowerCase().includes('router') ? 1 : 0, 0.01]);
  },
  id: () => 'router:test',
};

function ddgFetch(body: unknown) {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status: 200 }));
}

describe('Brain', () => {
  let repository: MemoryRepository;
  let brain: Brain;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    repository = new MemoryRepository(sampleRecords());
    brain = await createBrain(offlineConfig(), { repository, embedder: null });
  });

  afterEach(() => {
    brain.close();
    vi.restoreAllMocks();
  });

  describe('solve', () => {
    it('answers an alias from the knowledge base', async () => {
      await expect(brain.solve('wifi not working')).resolves.toEqual({ source: 'local', answer: 'Restart your router.' });
    });

    it('answers a paraphrase through fuzzy matching', async () => {
      await expect(brain.solve('my wifi is not working', 'en')).resolves.toEqual({
        source: 'local',
        answer: 'Restart your router.',
      });
    });

    it('answers in Nepali', async () => {
      await expect(brain.solve('इन्टरनेट चल्दैन', 'np')).resolves.toEqual({
        source: 'local',
        answer: 'राउटर पुनः सुरु गर्नुहोस्।',
      });
    });

    it('returns the no-solution sentinel when offline and nothing matches', async () => {
      await expect(brain.solve('completely unrelated nonsense query')).resolves.toEqual({
        source: 'none',
        answer: NO_SOLUTION,
      });
    });

    it('applies a per-call confidence threshold', async () => {
      await expect(brain.solve('pritner jam', 'en')).resolves.toEqual({
        source: 'local',
        answer: 'Open the tray and remove the paper.',
      });
      await expect(brain.solve('pritner jam', 'en', 95)).resolves.toEqual({ source: 'none', answer: NO_SOLUTION });
    });

    it('treats a blank query as unsolved but still records it', async () => {
      await expect(brain.solve('   ')).resolves.toEqual({ source: 'none', answer: NO_SOLUTION });
      expect(brain.history()).toHaveLength(1);
    });

    it('publishes the outcome on the resolution channel', async () => {
      const bus = new EventBus();
      const seen: unknown[] = [];
      bus.subscribe('resolution', (msg) => seen.push(msg));
      const observed = await createBrain(offlineConfig(), { repository, embedder: null, eventBus: bus });

      await observed.solve('printer jam');
      expect(seen).toEqual([
        { event: 'solved', data: { query: 'printer jam', source: 'local', recordId: 'print002', score: 100, exact: true } },
      ]);
      observed.close();
    });
  });

  describe('fallbacks', () => {
    it('uses semantic search before the web', async () => {
      const fetch = ddgFetch({});
      const config = defaultConfig();
      const semantic = await createBrain(config, { repository, embedder: routerEmbedder, fetch });

      await expect(semantic.solve('the router keeps blinking')).resolves.toEqual({
        source: 'semantic',
        answer: 'Restart your router.',
      });
      expect(fetch).not.toHaveBeenCalled();
      expect(semantic.stats().semanticEnabled).toBe(true);
      semantic.close();
    });

    it('searches the web when online and nothing local matches', async () => {
      const fetch = ddgFetch({
        Heading: 'Kernel panic',
        AbstractText: 'A kernel panic is a safety measure.',
        AbstractURL: 'https://en.wikipedia.org/wiki/Kernel_panic',
        RelatedTopics: [],
      });
      const online = await createBrain(defaultConfig(), { repository, embedder: null, fetch });

      await expect(online.solve('kernel panic on boot')).resolves.toEqual({
        source: 'internet',
        answer: '🔎 Kernel panic\n📝 A kernel panic is a safety measure.\n🔗 https://en.wikipedia.org/wiki/Kernel_panic',
      });
      expect(online.stats().internetLookups).toBe(1);
      online.close();
    });

    it('reports the web sentinel when the web has nothing either', async () => {
      const fetch = ddgFetch({ query: { search: [] }, RelatedTopics: [] });
      const online = await createBrain(defaultConfig(), { repository, embedder: null, fetch });

      await expect(online.solve('kernel panic on boot')).resolves.toEqual({ source: 'internet', answer: NO_WEB_RESULTS });
      online.close();
    });

    it('can switch internet lookups on at run time', async () => {
      const fetch = ddgFetch({ RelatedTopics: [] });
      const config = offlineConfig();
      const toggled = await createBrain(config, { repository, embedder: null, fetch });

      toggled.setInternetEnabled(true);
      await expect(toggled.solve('kernel panic on boot')).resolves.toEqual({ source: 'internet', answer: NO_WEB_RESULTS });
      expect(toggled.stats().internetEnabled).toBe(true);
      toggled.close();
    });

    it('records unmatched queries when a log is configured', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'deskmate-brain-'));
      const config = offlineConfig();
      config.history.unmatchedLog = path.join(dir, 'unmatched.jsonl');
      const logging = await createBrain(config, { repository, embedder: null });

      await logging.solve('screen is black');
      await logging.solve('printer jam');

      const entries = await new UnmatchedLog(path.join(dir, 'unmatched.jsonl')).read();
      expect(entries.map((e) => [e.query, e.lang])).toEqual([['screen is black', 'en']]);
      logging.close();
      await fs.rm(dir, { recursive: true, force: true });
    });
  });

  describe('teach', () => {
    it('stores a learned record that answers the same query next time', async () => {
      await expect(brain.solve('screen is black')).resolves.toEqual({ source: 'none', answer: NO_SOLUTION });

      const taught = await brain.teach('  screen is black ', 'Check the cable.');

      expect(taught).toEqual({
        id: '40cbccd1',
        aliases: { en: ['screen is black'], np: ['screen is black'] },
        answers: { en: 'Check the cable.', np: 'Check the cable.' },
        autoFix: false,
        learned: true,
      });
      expect(repository.current.map((r) => r.id)).toContain('40cbccd1');
      await expect(brain.solve('screen is black')).resolves.toEqual({ source: 'local', answer: 'Check the cable.' });
      await expect(brain.solve('screen is black', 'np')).resolves.toEqual({ source: 'local', answer: 'Check the cable.' });
    });

    it('keeps a separate Nepali answer', async () => {
      const taught = await brain.teach('screen is black', 'Check the cable.', 'केबल जाँच गर्नुहोस्।');
      expect(taught.answers).toEqual({ en: 'Check the cable.', np: 'केबल जाँच गर्नुहोस्।' });
    });

    it('rejects a blank query or answer', async () => {
      await expect(brain.teach('  ', 'answer')).rejects.toThrow(FormatError);
      await expect(brain.teach('query', ' ')).rejects.toThrow(FormatError);
      expect(brain.stats().totalProblems).toBe(3);
    });

    it('keeps the record in memory when saving fails', async () => {
      repository.failSaves = true;

      await expect(brain.teach('screen is black', 'Check the cable.')).rejects.toThrow(PersistenceError);
      await expect(brain.solve('screen is black')).resolves.toEqual({ source: 'local', answer: 'Check the cable.' });
    });
  });

  describe('stats and history', () => {
    it('reports component state without changing it', async () => {
      const first = brain.stats();
      expect(first).toEqual({
        totalProblems: 3,
        cacheSize: 0,
        semanticEnabled: false,
        internetEnabled: false,
        internetLookups: 0,
        historySize: 0,
      });
      expect(brain.stats()).toEqual(first);

      await brain.solve('printer jam');
      expect(brain.stats()).toMatchObject({ cacheSize: 1, historySize: 1 });
    });

    it('keeps only the configured number of recent queries', async () => {
      const config = offlineConfig();
      config.history.limit = 2;
      const short = await createBrain(config, { repository, embedder: null });

      await short.solve('one');
      await short.solve('two');
      await short.solve('तीन', 'np');

      expect(short.history().map((e) => [e.query, e.lang])).toEqual([['two', 'en'], ['तीन', 'np']]);
      short.close();
    });
  });

  it('detects the language of a query', () => {
    expect(brain.detectLanguage('मेरो कम्प्युटर चल्दैन')).toBe('np');
    expect(brain.detectLanguage('my computer is slow')).toBe('en');
  });

  it('closes the repository', () => {
    brain.close();
    expect(repository.closed).toBe(true);
  });
});

describe('createBrain', () => {
  it('fails when the knowledge base file is missing', async () => {
    const config = offlineConfig();
    config.knowledge.path = path.join(os.tmpdir(), 'deskmate-missing', 'problems.json');

    await expect(createBrain(config, { embedder: null })).rejects.toThrow(NotFoundError);
  });

  it('keeps undecodable entries in the knowledge base file when teaching', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deskmate-brain-'));
    const file = path.join(tmpDir, 'problems.json');
    await fs.writeFile(file, JSON.stringify([
      { id: 'a', aliases: ['printer jam'], en: 'Open the tray.' },
      { id: 'b', en: 42, note: 'operator typo' },
    ]), 'utf-8');
    const config = offlineConfig();
    config.knowledge.path = file;

    const brain = await createBrain(config, { embedder: null });
    await brain.teach('wifi slow', 'Move closer.');
    brain.close();

    const raw: Array<Record<string, unknown>> = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(raw.map((element) => element.id)).toEqual(['a', 'b', '53d261c5']);
    await fs.rm(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads the bundled knowledge base by default', async () => {
    const brain = await createBrain(offlineConfig(), { embedder: null });
    expect(brain.stats().totalProblems).toBe(15);
    brain.close();
  });
});
