import { readFileSync } from 'fs';
import logger from '../utils/logger.js';
import { waterDatasetSchema } from '../types/index.js';
import type {
  Alert,
  AlertSeverity,
  HistoricalRecord,
  QualityPrediction,
  WaterDataset,
  WaterSource,
} from '../types/index.js';

export interface HistoricalFilter {
  metricId?: string;
  /** Inclusive, YYYY-MM-DD */
  from?: string;
  /** Inclusive, YYYY-MM-DD */
  to?: string;
}

export interface AlertFilter {
  sourceId?: string;
  severity?: AlertSeverity;
}

/**
 * Read-only access to water records. Lookups resolve to undefined on a miss;
 * failures of the backing store reject with DataStoreError.
 */
export interface WaterDataStore {
  listSources(): Promise<WaterSource[]>;
  getSource(id: string): Promise<WaterSource | undefined>;
  getPrediction(sourceId: string): Promise<QualityPrediction | undefined>;
  listHistorical(filter?: HistoricalFilter): Promise<HistoricalRecord[]>;
  listAlerts(filter?: AlertFilter): Promise<Alert[]>;
}

export class InMemoryWaterDataStore implements WaterDataStore {
  private readonly sources: Map<string, WaterSource>;
  private readonly predictions: Map<string, QualityPrediction>;

  constructor(private readonly dataset: WaterDataset) {
    this.sources = new Map(dataset.waterSources.map((source): [string, WaterSource] => [source.id, source]));
    this.predictions = new Map(Object.entries(dataset.qualityPredictions));
  }

  async listSources(): Promise<WaterSource[]> {
    return this.dataset.waterSources;
  }

  async getSource(id: string): Promise<WaterSource | undefined> {
    return this.sources.get(id);
  }

  async getPrediction(sourceId: string): Promise<QualityPrediction | undefined> {
    return this.predictions.get(sourceId);
  }

  async listHistorical(filter: HistoricalFilter = {}): Promise<HistoricalRecord[]> {
    const { metricId, from, to } = filter;
    const byMetric = metricId
      ? this.dataset.historicalData.filter(record => record.metricId === metricId)
      : this.dataset.historicalData;

    if (!from && !to) {
      return byMetric;
    }

    // ISO dates compare correctly as strings
    return byMetric
      .map(record => ({
        ...record,
        data: record.data.filter(point => (!from || point.date >= from) && (!to || point.date <= to)),
      }))
      .filter(record => record.data.length > 0);
  }

  async listAlerts(filter: AlertFilter = {}): Promise<Alert[]> {
    const { sourceId, severity } = filter;
    return this.dataset.alerts.filter(alert =>
      (!sourceId || alert.sourceId === sourceId) &&
      (!severity || alert.severity === severity)
    );
  }
}

export function loadWaterDataset(filePath: string): WaterDataset {
  const parsed = waterDatasetSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf8')));
  if (!parsed.success) {
    throw new Error(`Invalid water dataset ${filePath}: ${parsed.error.message}`);
  }

  logger.info('Water dataset loaded', {
    path: filePath,
    sources: parsed.data.waterSources.length,
    alerts: parsed.data.alerts.length,
  });
  return parsed.data;
}
