import { describe, it, expect } from 'vitest';
import { applyTimeframeInference, inferFromTimeframes, INFERRED_SOURCE } from '../../src/consensus/inference.js';
import type { PredictionRecord } from '../../src/consensus/predictions.js';
import { makePrediction } from '../helpers.js';

describe('inferFromTimeframes', () => {
  const records = [
    makePrediction('groq', 'Sell', 0.4, { timeframe: '5d', timestamp: '2024-01-02T10:00:00.000Z' }),
    makePrediction('groq', 'Sell', 0.6, { timeframe: '30d', timestamp: '2024-01-02T12:00:00.000Z' }),
    makePrediction('groq', 'Buy', 0.9, { timeframe: 'intraday' })
  ];

  it('votes and averages over the other timeframes', () => {
    const inferred = inferFromTimeframes('NQ', 'intraday', 'groq', records);
    expect(inferred).toEqual({
      symbol: 'NQ',
      timeframe: 'intraday',
      source: 'groq',
      label: 'Sell',
      confidence: 0.5,
      technicalAnalysis: 'Analysis inferred from the 5d, 30d predictions for NQ.',
      keyFactors: ['Inferred from other timeframes'],
      inferredFrom: ['5d', '30d'],
      inferred: true,
      timestamp: '2024-01-02T12:00:00.000Z'
    });
  });

  it('ignores records that were themselves inferred', () => {
    const onlyInferred = [makePrediction('groq', 'Buy', 0.5, { timeframe: '5d', inferred: true })];
    expect(inferFromTimeframes('NQ', 'intraday', 'groq', onlyInferred)).toBeUndefined();
  });

  it('returns undefined when there is nothing to infer from', () => {
    expect(inferFromTimeframes('NQ', 'intraday', 'groq', [])).toBeUndefined();
    expect(inferFromTimeframes('ES', '5d', 'groq', records)).toBeUndefined();
  });
});

describe('applyTimeframeInference', () => {
  const sources = ['deepseek', 'gemini', 'groq'];
  const direct = new Map<string, PredictionRecord>([['deepseek', makePrediction('deepseek', 'Buy', 0.8)]]);
  const history = new Map<string, PredictionRecord[]>([
    ['deepseek', [makePrediction('deepseek', 'Buy', 0.8), makePrediction('deepseek', 'Buy', 0.7, { timeframe: '5d' })]],
    ['gemini', [makePrediction('gemini', 'Hold', 0.3, { timeframe: '30d' })]],
    ['groq', []]
  ]);

  it('does nothing when off', () => {
    expect(applyTimeframeInference('off', { symbol: 'NQ', timeframe: 'intraday', sources, direct, history })).toEqual([]);
  });

  it('fills each missing source from its own history in per_source mode', () => {
    const inferred = applyTimeframeInference('per_source', {
      symbol: 'NQ',
      timeframe: 'intraday',
      sources,
      direct,
      history
    });
    expect(inferred.map((r) => [r.source, r.label, r.confidence])).toEqual([['gemini', 'Hold', 0.3]]);
  });

  it('skips aggregate mode while any source has a direct record', () => {
    expect(applyTimeframeInference('aggregate', { symbol: 'NQ', timeframe: 'intraday', sources, direct, history })).toEqual(
      []
    );
  });

  it('builds one placeholder from every source in aggregate mode', () => {
    const inferred = applyTimeframeInference('aggregate', {
      symbol: 'NQ',
      timeframe: 'intraday',
      sources,
      direct: new Map(),
      history
    });
    expect(inferred).toHaveLength(1);
    expect(inferred[0]?.source).toBe(INFERRED_SOURCE);
    // basis: deepseek 5d Buy 0.7, gemini 30d Hold 0.3
    expect(inferred[0]?.label).toBe('Hold');
    expect(inferred[0]?.confidence).toBeCloseTo(0.5, 10);
  });
});
