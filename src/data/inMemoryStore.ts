import type { ConsensusRecord } from '../consensus/types.js';
import type { PredictionRecord } from '../consensus/predictions.js';
import { TIMEFRAMES } from '../core/types.js';
import type { Timeframe } from '../core/types.js';
import { consensusKey, predictionKey } from './predictionStore.js';
import type { ConsensusStore, PredictionStore } from './predictionStore.js';

export class InMemoryStore implements PredictionStore, ConsensusStore {
  private readonly predictions = new Map<string, PredictionRecord>();
  private readonly consensus = new Map<string, ConsensusRecord>();

  async savePrediction(record: PredictionRecord): Promise<void> {
    this.predictions.set(predictionKey(record.source, record.symbol, record.timeframe), structuredClone(record));
  }

  async getPrediction(source: string, symbol: string, timeframe: Timeframe): Promise<PredictionRecord | undefined> {
    const record = this.predictions.get(predictionKey(source, symbol, timeframe));
    return record ? structuredClone(record) : undefined;
  }

  async getPredictionsForSymbol(source: string, symbol: string): Promise<PredictionRecord[]> {
    const out: PredictionRecord[] = [];
    for (const timeframe of TIMEFRAMES) {
      const record = await this.getPrediction(source, symbol, timeframe);
      if (record) out.push(record);
    }
    return out;
  }

  async saveConsensus(record: ConsensusRecord): Promise<void> {
    this.consensus.set(consensusKey(record.symbol, record.timeframe), structuredClone(record));
  }

  async getConsensus(symbol: string, timeframe: Timeframe): Promise<ConsensusRecord | undefined> {
    const record = this.consensus.get(consensusKey(symbol, timeframe));
    return record ? structuredClone(record) : undefined;
  }

  async listConsensus(symbol: string): Promise<ConsensusRecord[]> {
    const out: ConsensusRecord[] = [];
    for (const timeframe of TIMEFRAMES) {
      const record = await this.getConsensus(symbol, timeframe);
      if (record) out.push(record);
    }
    return out;
  }
}
