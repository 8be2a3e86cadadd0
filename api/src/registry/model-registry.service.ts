import { Injectable, Logger } from '@nestjs/common';
import {
  NoReadyVersionError,
  TrainingFailureError,
  VersionNotFoundError,
  errorMessage,
} from '../common/errors/domain.errors';
import { ModelMetrics } from '../common/models/prediction.model';
import { KeyedMutex } from '../common/utils/concurrency.utils';
import { ModelArtifact } from '../predictor/predictor.interface';
import { ScalerState } from '../predictor/min-max-scaler';
import { FsArtifactStore } from './artifact-store';
import {
  LATEST,
  ModelVersion,
  TrainingDetails,
  VersionIndex,
  VersionSelector,
  parseModelVersion,
  parseVersionIndex,
  parseVersionToken,
  versionToken,
} from './model-version.model';

export interface PublishPayload {
  artifact: ModelArtifact;
  scaler: ScalerState;
  metrics: ModelMetrics;
  training?: TrainingDetails;
}

export interface LoadedArtifacts {
  artifact: unknown;
  scaler: unknown;
}

const INTERRUPTED = 'interrupted before publish completed';

/**
 * Versioned model artifacts per instrument.
 *
 * The per-instrument index is the single source of truth; directory layout is
 * derived from it. A version becomes visible to `resolve` only once its model,
 * scaler and metrics are durably written and the index records it as ready.
 * Index mutations are serialized per instrument; instruments are independent.
 */
@Injectable()
export class ModelRegistryService {
  private readonly logger = new Logger(ModelRegistryService.name);
  private readonly indexes = new Map<string, VersionIndex>();
  private readonly locks = new KeyedMutex();

  constructor(private readonly store: FsArtifactStore) {}

  /* ----------------------------- Public API ----------------------------- */

  /**
   * "latest" resolves to the newest ready version; an explicit token must name
   * a ready version.
   */
  async resolve(instrumentId: string, selector: VersionSelector = LATEST): Promise<ModelVersion> {
    const index = await this.current(instrumentId);

    if (selector === LATEST) {
      const ready = index.versions.filter((v) => v.status === 'ready');
      const newest = ready[ready.length - 1];
      if (!newest) throw new NoReadyVersionError(instrumentId);
      return { ...newest };
    }

    const found = this.find(index, selector);
    if (found.status !== 'ready') {
      throw new VersionNotFoundError(
        `Version ${selector} of ${instrumentId} is ${found.status}, not ready`,
        { instrumentId, version: selector },
      );
    }
    return { ...found };
  }

  /**
   * Allocates the next version number in `training` state.
   */
  async reserve(instrumentId: string): Promise<ModelVersion> {
    return this.locks.run(instrumentId, async () => {
      const index = await this.loadIfMissing(instrumentId);
      const n = index.nextVersion;
      const version = versionToken(n);
      const dir = `${instrumentId}/${version}`;
      const now = new Date().toISOString();

      const mv: ModelVersion = {
        instrumentId,
        version,
        number: n,
        status: 'training',
        artifactRef: `${dir}/model.json`,
        scalerRef: `${dir}/scaler.json`,
        metricsRef: `${dir}/metrics.json`,
        metrics: null,
        createdAt: now,
        updatedAt: now,
      };

      await this.store.writeJson(`${dir}/version.json`, mv);
      await this.commit({ instrumentId, nextVersion: n + 1, versions: [...index.versions, mv] });
      this.logger.log(`${instrumentId}: reserved ${version}`);
      return { ...mv };
    });
  }

  /**
   * Writes scaler, model and metrics, then marks the version ready.
   * Uses `reserved` when given, otherwise allocates a new version. A failed write
   * leaves the version `failed` and raises TrainingFailure carrying its token.
   */
  async publish(
    instrumentId: string,
    payload: PublishPayload,
    reserved?: ModelVersion,
  ): Promise<ModelVersion> {
    const mv = reserved ?? (await this.reserve(instrumentId));
    const ctx = { instrumentId, version: mv.version };

    const current = this.find(await this.current(instrumentId), mv.version);
    if (current.status !== 'training') {
      throw new TrainingFailureError(`Cannot publish ${mv.version}: it is ${current.status}`, ctx);
    }

    try {
      await this.store.writeJson(mv.scalerRef, payload.scaler);
      await this.store.writeJson(mv.artifactRef, payload.artifact);
      await this.store.writeJson(mv.metricsRef, payload.metrics);
    } catch (e) {
      const reason = `artifact write failed: ${errorMessage(e)}`;
      await this.markFailed(instrumentId, mv.version, reason);
      throw new TrainingFailureError(`Publishing ${instrumentId} ${mv.version} failed: ${reason}`, ctx, {
        cause: e,
      });
    }

    try {
      const ready = await this.transition(instrumentId, mv.version, (v) => {
        // re-checked under the lock: a concurrent markFailed wins
        if (v.status !== 'training') {
          throw new TrainingFailureError(`Cannot publish ${mv.version}: it is ${v.status}`, ctx);
        }
        const next: ModelVersion = { ...v, status: 'ready', metrics: { ...payload.metrics } };
        if (payload.training) next.training = { ...payload.training };
        return next;
      });
      this.logger.log(
        `${instrumentId}: published ${ready.version} (MAE=${payload.metrics.mae.toFixed(4)})`,
      );
      return ready;
    } catch (e) {
      if (e instanceof TrainingFailureError) throw e;
      const reason = `index update failed: ${errorMessage(e)}`;
      await this.markFailed(instrumentId, mv.version, reason);
      throw new TrainingFailureError(`Publishing ${instrumentId} ${mv.version} failed: ${reason}`, ctx, {
        cause: e,
      });
    }
  }

  /**
   * training -> failed. Already failed versions are returned unchanged;
   * ready versions are immutable.
   */
  async markFailed(instrumentId: string, version: string, reason: string): Promise<ModelVersion> {
    return this.transition(instrumentId, version, (v) => {
      if (v.status === 'failed') return v;
      if (v.status === 'ready') {
        throw new Error(`${instrumentId} ${version} is ready and cannot be marked failed`);
      }
      this.logger.error(`${instrumentId}: ${version} failed: ${reason}`);
      return { ...v, status: 'failed', failureReason: reason };
    });
  }

  /** Every version of an instrument, oldest first, failed ones included. */
  async list(instrumentId: string): Promise<ModelVersion[]> {
    const index = await this.current(instrumentId);
    return index.versions.map((v) => ({ ...v }));
  }

  /** One version in any state. */
  async inspect(instrumentId: string, version: string): Promise<ModelVersion> {
    return { ...this.find(await this.current(instrumentId), version) };
  }

  async loadArtifacts(mv: ModelVersion): Promise<LoadedArtifacts> {
    const [artifact, scaler] = await Promise.all([
      this.store.readJson(mv.artifactRef),
      this.store.readJson(mv.scalerRef),
    ]);
    if (artifact === undefined || scaler === undefined) {
      throw new VersionNotFoundError(
        `Artifacts of ${mv.instrumentId} ${mv.version} are missing from the store`,
        { instrumentId: mv.instrumentId, version: mv.version },
      );
    }
    return { artifact, scaler };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private find(index: VersionIndex, token: string): ModelVersion {
    const n = parseVersionToken(token);
    const found = n === null ? undefined : index.versions.find((v) => v.number === n);
    if (!found) {
      throw new VersionNotFoundError(`Version ${token} of ${index.instrumentId} does not exist`, {
        instrumentId: index.instrumentId,
        version: token,
      });
    }
    return found;
  }

  private async current(instrumentId: string): Promise<VersionIndex> {
    return this.indexes.get(instrumentId) ?? this.locks.run(instrumentId, () => this.loadIfMissing(instrumentId));
  }

  private async transition(
    instrumentId: string,
    version: string,
    change: (v: ModelVersion) => ModelVersion,
  ): Promise<ModelVersion> {
    return this.locks.run(instrumentId, async () => {
      const index = await this.loadIfMissing(instrumentId);
      const before = this.find(index, version);
      const after = change(before);
      if (after === before) return { ...before };

      const updated: ModelVersion = { ...after, updatedAt: new Date().toISOString() };
      await this.store.writeJson(`${instrumentId}/${version}/version.json`, updated);
      await this.commit({
        ...index,
        versions: index.versions.map((v) => (v.number === updated.number ? updated : v)),
      });
      return { ...updated };
    });
  }

  /** Persists the index, then makes it the in-memory view. */
  private async commit(index: VersionIndex): Promise<void> {
    await this.store.writeJson(`${index.instrumentId}/index.json`, index);
    this.indexes.set(index.instrumentId, index);
  }

  /**
   * Loads the index (caller holds the instrument lock). A missing or unreadable
   * index is rebuilt from the per-version metadata; versions still in training
   * were cut off by a restart and are marked failed.
   */
  private async loadIfMissing(instrumentId: string): Promise<VersionIndex> {
    const cached = this.indexes.get(instrumentId);
    if (cached) return cached;

    let index: VersionIndex | null = null;
    try {
      index = parseVersionIndex(await this.store.readJson(`${instrumentId}/index.json`), instrumentId);
    } catch (e) {
      this.logger.warn(`${instrumentId}: index unreadable (${errorMessage(e)}); rebuilding`);
    }
    let dirty = false;
    if (!index) {
      index = await this.rebuild(instrumentId);
      dirty = index.versions.length > 0;
    }

    const now = new Date().toISOString();
    const versions: ModelVersion[] = [];
    for (const v of index.versions) {
      if (v.status !== 'training') {
        versions.push(v);
        continue;
      }
      const failed: ModelVersion = { ...v, status: 'failed', failureReason: INTERRUPTED, updatedAt: now };
      await this.store.writeJson(`${instrumentId}/${v.version}/version.json`, failed);
      this.logger.warn(`${instrumentId}: ${v.version} was ${INTERRUPTED}; marked failed`);
      versions.push(failed);
      dirty = true;
    }

    const highest = versions.reduce((m, v) => Math.max(m, v.number), 0);
    const nextVersion = Math.max(index.nextVersion, highest + 1);
    const loaded: VersionIndex = { instrumentId, nextVersion, versions };

    if (dirty || nextVersion !== index.nextVersion) await this.commit(loaded);
    else this.indexes.set(instrumentId, loaded);
    return loaded;
  }

  private async rebuild(instrumentId: string): Promise<VersionIndex> {
    const versions: ModelVersion[] = [];
    // unreadable version directories still burn their number
    let highest = 0;
    for (const dir of await this.store.listDirs(instrumentId)) {
      const n = parseVersionToken(dir);
      if (n === null) continue;
      highest = Math.max(highest, n);
      const mv = await this.readVersion(instrumentId, dir);
      if (mv && mv.instrumentId === instrumentId && mv.version === dir) versions.push(mv);
      else this.logger.warn(`${instrumentId}/${dir}: no readable version metadata; skipped`);
    }
    versions.sort((a, b) => a.number - b.number);
    if (versions.length) this.logger.log(`${instrumentId}: rebuilt index with ${versions.length} version(s)`);
    return { instrumentId, nextVersion: highest + 1, versions };
  }

  private async readVersion(instrumentId: string, dir: string): Promise<ModelVersion | null> {
    try {
      return parseModelVersion(await this.store.readJson(`${instrumentId}/${dir}/version.json`));
    } catch (e) {
      this.logger.warn(`${instrumentId}/${dir}/version.json unreadable: ${errorMessage(e)}`);
      return null;
    }
  }
}
