import { describe, it, expect, beforeEach } from 'vitest';
import { combinePredictions, ConsensusEngine } from '../../src/consensus/engine.js';
import type { TimeframeInferenceMode } from '../../src/config/types.js';
import { InvalidPredictionError, NoPredictionsAvailableError } from '../../src/core/errors.js';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { InMemoryStore } from '../../src/data/inMemoryStore.js';
import { createMockLogger, makePrediction } from '../helpers.js';

const SOURCES = ['deepseek', 'gemini', 'groq'];
const TS = '2024-01-02T16:00:00.000Z';

describe('combinePredictions', () => {
  it('takes the majority label and the mean confidence', () => {
    const consensus = combinePredictions(
      'NQ',
      'intraday',
      [
        makePrediction('deepseek', 'Buy', 0.8),
        makePrediction('gemini', 'Buy', 0.6),
        makePrediction('groq', 'Sell', 0.9)
      ],
      { sources: SOURCES, timestamp: TS }
    );
    expect(consensus.label).toBe('Buy');
    expect(consensus.confidence).toBeCloseTo(0.7667, 4);
    expect(consensus.voteCounts).toEqual({ Buy: 2, Sell: 1, Hold: 0 });
    expect(consensus.sources).toEqual(SOURCES);
    expect(consensus.missingSources).toEqual([]);
    expect(consensus.inferred).toBe(false);
    expect(consensus.timestamp).toBe(TS);
  });

  it('resolves a three-way split to Hold', () => {
    const consensus = combinePredictions(
      'NQ',
      'intraday',
      [
        makePrediction('deepseek', 'Buy', 0.8),
        makePrediction('gemini', 'Sell', 0.6),
        makePrediction('groq', 'Hold', 0.4)
      ],
      { sources: SOURCES, timestamp: TS }
    );
    expect(consensus.label).toBe('Hold');
    expect(consensus.voteCounts).toEqual({ Buy: 1, Sell: 1, Hold: 1 });
  });

  it('averages only over the sources present', () => {
    const consensus = combinePredictions(
      'NQ',
      'intraday',
      [makePrediction('gemini', 'Sell', 0.5), makePrediction('groq', 'Sell', 0.7)],
      { sources: SOURCES, timestamp: TS }
    );
    expect(consensus.confidence).toBeCloseTo(0.6, 10);
    expect(consensus.missingSources).toEqual(['deepseek']);
  });

  it('orders contributions by configured source, then by name', () => {
    const consensus = combinePredictions(
      'NQ',
      'intraday',
      [
        makePrediction('zeta', 'Buy', 0.5),
        makePrediction('groq', 'Buy', 0.5),
        makePrediction('alpha', 'Buy', 0.5),
        makePrediction('deepseek', 'Buy', 0.5)
      ],
      { sources: SOURCES, timestamp: TS }
    );
    expect(consensus.sources).toEqual(['deepseek', 'groq', 'alpha', 'zeta']);
    expect(Object.keys(consensus.predictions)).toEqual(['deepseek', 'groq', 'alpha', 'zeta']);
  });

  it('throws on an empty set', () => {
    expect(() => combinePredictions('NQ', 'intraday', [], { timestamp: TS })).toThrow(NoPredictionsAvailableError);
  });

  it('rejects records for another key or a repeated source', () => {
    expect(() =>
      combinePredictions('NQ', 'intraday', [makePrediction('groq', 'Buy', 0.5, { timeframe: '5d' })], { timestamp: TS })
    ).toThrow(InvalidPredictionError);
    expect(() =>
      combinePredictions('NQ', 'intraday', [makePrediction('groq', 'Buy', 0.5), makePrediction('groq', 'Sell', 0.5)], {
        timestamp: TS
      })
    ).toThrow('Duplicate prediction from groq');
  });
});

describe('ConsensusEngine', () => {
  let store: InMemoryStore;
  let metrics: InMemoryMetrics;
  let logger: ReturnType<typeof createMockLogger>;
  let now: Date;

  const engine = (inference: TimeframeInferenceMode = 'off'): ConsensusEngine =>
    new ConsensusEngine({
      sources: SOURCES,
      predictions: store,
      store,
      logger,
      metrics,
      inference,
      clock: () => now
    });

  beforeEach(() => {
    store = new InMemoryStore();
    metrics = new InMemoryMetrics();
    logger = createMockLogger();
    now = new Date(TS);
  });

  it('aggregates stored predictions and persists the result', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8));
    await store.savePrediction(makePrediction('gemini', 'Buy', 0.6));
    await store.savePrediction(makePrediction('groq', 'Sell', 0.9));

    const consensus = await engine().aggregate('NQ', 'intraday');
    expect(consensus.label).toBe('Buy');
    expect(consensus.voteCounts).toEqual({ Buy: 2, Sell: 1, Hold: 0 });
    expect(consensus.predictions.groq?.technicalAnalysis).toBe('groq technical view');
    expect(await store.getConsensus('NQ', 'intraday')).toEqual(consensus);

    expect(metrics.snapshot().counters).toEqual({ 'consensus_aggregations_total{timeframe=intraday}': 1 });
    const saved = logger.entries.find((e) => e.message === 'consensus saved');
    expect(saved?.context).toMatchObject({ component: 'consensus', symbol: 'NQ', label: 'Buy' });
  });

  it('throws and writes nothing when no source has a prediction', async () => {
    await expect(engine().aggregate('NQ', 'intraday')).rejects.toThrow(NoPredictionsAvailableError);
    expect(await store.getConsensus('NQ', 'intraday')).toBeUndefined();
    expect(metrics.snapshot().counters).toEqual({ 'consensus_no_predictions_total{timeframe=intraday}': 1 });
  });

  it('keeps a previous consensus when a later aggregation has no predictions', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8, { timeframe: '5d' }));
    const first = await engine().aggregate('NQ', '5d');
    await expect(engine().aggregate('NQ', 'intraday')).rejects.toThrow(NoPredictionsAvailableError);
    expect(await store.getConsensus('NQ', '5d')).toEqual(first);
  });

  it('reports missing sources as an advisory', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Sell', 0.5));
    await store.savePrediction(makePrediction('gemini', 'Sell', 0.7));

    const consensus = await engine().aggregate('NQ', 'intraday');
    expect(consensus.missingSources).toEqual(['groq']);
    const advisory = logger.entries.find((e) => e.message === 'consensus advisory');
    expect(advisory?.level).toBe('warn');
    expect(advisory?.context).toMatchObject({ code: 'PARTIAL_PREDICTIONS', required: 3, available: 2 });
    expect(metrics.snapshot().counters['consensus_partial_total{timeframe=intraday}']).toBe(1);
  });

  it('replaces the stored record on re-aggregation', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8));
    await engine().aggregate('NQ', 'intraday');

    await store.savePrediction(makePrediction('deepseek', 'Sell', 0.4));
    await engine().aggregate('NQ', 'intraday');

    const stored = await store.listConsensus('NQ');
    expect(stored).toHaveLength(1);
    expect(stored[0]?.label).toBe('Sell');
    expect(stored[0]?.confidence).toBe(0.4);
  });

  it('is idempotent apart from the timestamp', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8));
    await store.savePrediction(makePrediction('gemini', 'Hold', 0.6));

    const first = await engine().aggregate('NQ', 'intraday');
    now = new Date('2024-01-02T17:00:00.000Z');
    const second = await engine().aggregate('NQ', 'intraday');

    expect(second.timestamp).toBe('2024-01-02T17:00:00.000Z');
    expect({ ...second, timestamp: first.timestamp }).toEqual(first);
  });

  it('fills a missing source from its other timeframes in per_source mode', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8));
    await store.savePrediction(makePrediction('gemini', 'Buy', 0.6));
    await store.savePrediction(makePrediction('groq', 'Sell', 0.4, { timeframe: '5d' }));
    await store.savePrediction(makePrediction('groq', 'Sell', 0.6, { timeframe: '30d' }));

    const consensus = await engine('per_source').aggregate('NQ', 'intraday');
    expect(consensus.inferred).toBe(true);
    expect(consensus.sources).toEqual(SOURCES);
    expect(consensus.missingSources).toEqual([]);
    expect(consensus.voteCounts).toEqual({ Buy: 2, Sell: 1, Hold: 0 });
    expect(consensus.confidence).toBeCloseTo(0.6333, 4);
    expect(consensus.predictions.groq?.inferred).toBe(true);
    expect(logger.entries.some((e) => e.context.code === 'INFERRED_PREDICTIONS')).toBe(true);
  });

  it('builds one placeholder when no source has the timeframe in aggregate mode', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.9, { timeframe: '5d' }));
    await store.savePrediction(makePrediction('gemini', 'Hold', 0.5, { timeframe: '30d' }));

    const consensus = await engine('aggregate').aggregate('NQ', 'intraday');
    expect(consensus.sources).toEqual(['inferred']);
    expect(consensus.missingSources).toEqual(SOURCES);
    expect(consensus.label).toBe('Hold');
    expect(consensus.confidence).toBeCloseTo(0.7, 10);
    expect(consensus.inferred).toBe(true);
  });

  it('does not infer when inference is off', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.9, { timeframe: '5d' }));
    await expect(engine().aggregate('NQ', 'intraday')).rejects.toThrow(NoPredictionsAvailableError);
  });

  it('aggregates every timeframe for a symbol and reports the empty ones', async () => {
    await store.savePrediction(makePrediction('deepseek', 'Buy', 0.8));

    const result = await engine().aggregateSymbol('NQ');
    expect(result.records.map((r) => r.timeframe)).toEqual(['intraday']);
    expect(result.failures.map((f) => f.timeframe)).toEqual(['5d', '30d']);
    expect(result.failures[0]?.error).toBeInstanceOf(NoPredictionsAvailableError);
  });
});
