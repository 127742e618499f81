import { z } from 'zod';

// Water source types
const metricSchema = z.object({
  id: z.string(),
  name: z.string(),
  value: z.number(),
  unit: z.string(),
  safeRange: z.tuple([z.number(), z.number()]),
  status: z.enum(['safe', 'warning', 'danger']),
  icon: z.string(),
});

type Metric = z.infer<typeof metricSchema>;

const diseaseSchema = z.object({
  id: z.string(),
  name: z.string(),
  riskLevel: z.enum(['low', 'medium', 'high']),
  description: z.string(),
  causedBy: z.array(z.string()),
});

type Disease = z.infer<typeof diseaseSchema>;

const waterSourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  location: z.string(),
  type: z.string(),
  metrics: z.array(metricSchema),
  diseases: z.array(diseaseSchema),
});

export type WaterSource = z.infer<typeof waterSourceSchema>;

// Prediction types
const qualityPredictionSchema = z.object({
  score: z.number().int().min(0).max(100),
  status: z.string(),
  description: z.string(),
  improvementSteps: z.array(z.string()),
});

export type QualityPrediction = z.infer<typeof qualityPredictionSchema>;

// Historical readings
const historicalPointSchema = z.object({
  date: z.string().date(),
  value: z.number(),
});

type HistoricalPoint = z.infer<typeof historicalPointSchema>;

const historicalRecordSchema = z.object({
  metricId: z.string(),
  metricName: z.string(),
  data: z.array(historicalPointSchema),
});

export type HistoricalRecord = z.infer<typeof historicalRecordSchema>;

// Alerts
export const alertSeveritySchema = z.enum(['info', 'warning', 'critical']);

export type AlertSeverity = z.infer<typeof alertSeveritySchema>;

const alertSchema = z.object({
  id: z.string(),
  sourceId: z.string(),
  metricId: z.string(),
  severity: alertSeveritySchema,
  message: z.string(),
  issuedAt: z.string().datetime(),
});

export type Alert = z.infer<typeof alertSchema>;

// Dataset file
export const waterDatasetSchema = z.object({
  waterSources: z.array(waterSourceSchema),
  qualityPredictions: z.record(qualityPredictionSchema),
  historicalData: z.array(historicalRecordSchema),
  alerts: z.array(alertSchema),
});

export type WaterDataset = z.infer<typeof waterDatasetSchema>;
