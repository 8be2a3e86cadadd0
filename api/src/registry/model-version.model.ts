import { ModelMetrics } from '../common/models/prediction.model';

export type VersionStatus = 'training' | 'ready' | 'failed';

/** "latest" (latest ready) or an explicit token such as "v3". */
export type VersionSelector = string;

export const LATEST = 'latest';

/**
 * One trained generation of an instrument's predictor.
 * Immutable once ready or failed.
 */
export interface ModelVersion {
  instrumentId: string;
  version: string; // "v3"
  number: number; // 3
  status: VersionStatus;
  artifactRef: string; // relative to the artifact root, e.g. "PETR4/v3/model.json"
  scalerRef: string;
  metricsRef: string;
  metrics: ModelMetrics | null;
  createdAt: string;
  updatedAt: string;
  failureReason?: string;
  training?: TrainingDetails;
}

export interface TrainingDetails {
  epochs: number;
  batchSize: number;
  trainedBars: number;
  epochsRun: number;
}

/**
 * Per-instrument version list; the single source of truth for allocation.
 * nextVersion only grows, so numbers are never reused, even after failures.
 */
export interface VersionIndex {
  instrumentId: string;
  nextVersion: number;
  versions: ModelVersion[];
}

const STATUSES: readonly VersionStatus[] = ['training', 'ready', 'failed'];
const TOKEN = /^v([1-9]\d*)$/;

export function versionToken(n: number): string {
  return `v${n}`;
}

/** Version number of a "v{n}" token, or null. */
export function parseVersionToken(token: string): number | null {
  const m = TOKEN.exec(token);
  return m?.[1] ? Number(m[1]) : null;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function parseMetrics(v: unknown): ModelMetrics | null {
  if (!isRecord(v)) return null;
  const { mae, rmse, mape } = v;
  if (!isFiniteNumber(mae) || !isFiniteNumber(rmse) || !isFiniteNumber(mape)) return null;
  return { mae, rmse, mape };
}

function parseTraining(v: unknown): TrainingDetails | undefined {
  if (!isRecord(v)) return undefined;
  const { epochs, batchSize, trainedBars, epochsRun } = v;
  if (
    !isFiniteNumber(epochs) ||
    !isFiniteNumber(batchSize) ||
    !isFiniteNumber(trainedBars) ||
    !isFiniteNumber(epochsRun)
  ) {
    return undefined;
  }
  return { epochs, batchSize, trainedBars, epochsRun };
}

/**
 * Reads persisted version metadata; null when it is not a ModelVersion.
 */
export function parseModelVersion(v: unknown): ModelVersion | null {
  if (!isRecord(v)) return null;
  const { instrumentId, version, number, status, artifactRef, scalerRef, metricsRef } = v;
  const { createdAt, updatedAt, failureReason } = v;

  const s = STATUSES.find((x) => x === status);
  if (
    typeof instrumentId !== 'string' ||
    typeof version !== 'string' ||
    !isFiniteNumber(number) ||
    parseVersionToken(version) !== number ||
    !s ||
    typeof artifactRef !== 'string' ||
    typeof scalerRef !== 'string' ||
    typeof metricsRef !== 'string' ||
    typeof createdAt !== 'string' ||
    typeof updatedAt !== 'string'
  ) {
    return null;
  }

  const out: ModelVersion = {
    instrumentId,
    version,
    number,
    status: s,
    artifactRef,
    scalerRef,
    metricsRef,
    metrics: parseMetrics(v.metrics),
    createdAt,
    updatedAt,
  };
  if (typeof failureReason === 'string') out.failureReason = failureReason;
  const training = parseTraining(v.training);
  if (training) out.training = training;
  return out;
}

export function parseVersionIndex(v: unknown, instrumentId: string): VersionIndex | null {
  if (!isRecord(v) || v.instrumentId !== instrumentId) return null;
  if (!isFiniteNumber(v.nextVersion) || !Array.isArray(v.versions)) return null;

  const versions: ModelVersion[] = [];
  for (const raw of v.versions) {
    const mv = parseModelVersion(raw);
    if (!mv || mv.instrumentId !== instrumentId) return null;
    versions.push(mv);
  }
  return { instrumentId, nextVersion: v.nextVersion, versions };
}
