import { createHash, randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { performance } from 'node:perf_hooks';

import type {
  ArtifactManifest,
  ArtifactManifestStore,
  ManifestEntry,
  StageName,
} from '../../../domain/glitch-video/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { roundToPrecision } from '../../../shared/media/numberUtils.js';

export interface StageDescriptor {
  readonly name: StageName;
  readonly artifact: string;
  readonly dependsOn: readonly StageName[];
  /** Everything besides upstream artifacts that shapes the output. */
  readonly parameters: Readonly<Record<string, unknown>>;
  produce(): Promise<void>;
}

export type RebuildReason = 'missing' | 'untracked' | 'parameters-changed' | 'upstream-changed';

export interface StageReport {
  readonly stage: StageName;
  readonly artifact: string;
  readonly created: boolean;
  readonly reason: RebuildReason | 'cached';
  readonly durationMs: number;
}

export interface StageGraphRunnerOptions {
  readonly createRevision?: () => string;
}

/**
 * Runs stages in dependency order. A stage is rebuilt when its artifact is missing, when the
 * manifest has no record of it, when its parameters changed, or when any upstream stage now
 * carries a different revision than the one it was built from. Every rebuild mints a new
 * revision, which is what carries invalidation downstream.
 */
export class StageGraphRunner {
  private readonly logger = createChildLogger({ module: 'StageGraphRunner' });

  private readonly createRevision: () => string;

  public constructor(
    private readonly store: ArtifactManifestStore,
    options: StageGraphRunnerOptions = {},
  ) {
    this.createRevision = options.createRevision ?? randomUUID;
  }

  public async run(stages: readonly StageDescriptor[]): Promise<StageReport[]> {
    const ordered = orderStages(stages);
    const manifest: ArtifactManifest = { ...(await this.store.load()) };
    const revisions = new Map<StageName, string>();
    const reports: StageReport[] = [];

    for (const stage of ordered) {
      const startedAt = performance.now();
      const parametersHash = fingerprint(stage.parameters);
      const upstream = this.upstreamRevisions(stage, revisions);
      const previous = manifest[stage.name];
      const reason = await decideRebuild(stage, previous, parametersHash, upstream);

      if (reason === null && previous) {
        revisions.set(stage.name, previous.revision);
        this.logger.info({ stage: stage.name, artifact: stage.artifact }, 'Artifact is current, skipping');
        reports.push({ stage: stage.name, artifact: stage.artifact, created: false, reason: 'cached', durationMs: 0 });
        continue;
      }

      this.logger.info({ stage: stage.name, artifact: stage.artifact, reason }, 'Building artifact');

      // Forget the old entry first: a crash mid-stage must not leave it looking current.
      delete manifest[stage.name];
      await this.store.save(manifest);

      await stage.produce();

      if (!(await fileExists(stage.artifact))) {
        throw AppError.encoding('pipeline.artifact-missing', `Stage ${stage.name} finished without writing its artifact`, {
          stage: stage.name,
          artifact: stage.artifact,
        });
      }

      const entry: ManifestEntry = {
        artifact: stage.artifact,
        parametersHash,
        upstream,
        revision: this.createRevision(),
        builtAt: new Date().toISOString(),
      };
      manifest[stage.name] = entry;
      revisions.set(stage.name, entry.revision);
      await this.store.save(manifest);

      const durationMs = roundToPrecision(performance.now() - startedAt, 1);
      this.logger.info({ stage: stage.name, artifact: stage.artifact, durationMs }, 'Artifact built');
      reports.push({
        stage: stage.name,
        artifact: stage.artifact,
        created: true,
        reason: reason ?? 'untracked',
        durationMs,
      });
    }

    return reports;
  }

  private upstreamRevisions(stage: StageDescriptor, revisions: Map<StageName, string>): Record<string, string> {
    const upstream: Record<string, string> = {};

    for (const dependency of stage.dependsOn) {
      const revision = revisions.get(dependency);
      if (revision === undefined) {
        throw AppError.unsupported('pipeline.unresolved-dependency', `Stage ${stage.name} ran before ${dependency}`, {
          stage: stage.name,
          dependency,
        });
      }
      upstream[dependency] = revision;
    }

    return upstream;
  }
}

/** Stable topological order: among ready stages, declaration order wins. */
export function orderStages(stages: readonly StageDescriptor[]): StageDescriptor[] {
  const byName = new Map<StageName, StageDescriptor>();

  for (const stage of stages) {
    if (byName.has(stage.name)) {
      throw AppError.unsupported('pipeline.duplicate-stage', `Stage ${stage.name} is declared twice`, {
        stage: stage.name,
      });
    }
    byName.set(stage.name, stage);
  }

  for (const stage of stages) {
    for (const dependency of stage.dependsOn) {
      if (!byName.has(dependency)) {
        throw AppError.unsupported('pipeline.unknown-dependency', `Stage ${stage.name} depends on unknown ${dependency}`, {
          stage: stage.name,
          dependency,
        });
      }
    }
  }

  const ordered: StageDescriptor[] = [];
  const placed = new Set<StageName>();

  while (ordered.length < stages.length) {
    const next = stages.find(
      (stage) => !placed.has(stage.name) && stage.dependsOn.every((dependency) => placed.has(dependency)),
    );

    if (!next) {
      throw AppError.unsupported('pipeline.cycle', 'Stage dependencies form a cycle', {
        pending: stages.filter((stage) => !placed.has(stage.name)).map((stage) => stage.name),
      });
    }

    ordered.push(next);
    placed.add(next.name);
  }

  return ordered;
}

async function decideRebuild(
  stage: StageDescriptor,
  previous: ManifestEntry | undefined,
  parametersHash: string,
  upstream: Record<string, string>,
): Promise<RebuildReason | null> {
  if (!(await fileExists(stage.artifact))) {
    return 'missing';
  }

  if (!previous) {
    return 'untracked';
  }

  if (previous.artifact !== stage.artifact || previous.parametersHash !== parametersHash) {
    return 'parameters-changed';
  }

  const previousKeys = Object.keys(previous.upstream);
  const currentKeys = Object.keys(upstream);
  const upstreamChanged =
    previousKeys.length !== currentKeys.length ||
    currentKeys.some((key) => previous.upstream[key] !== upstream[key]);

  return upstreamChanged ? 'upstream-changed' : null;
}

export function fingerprint(value: unknown): string {
  return createHash('sha1').update(canonicalJson(value)).digest('hex');
}

/** JSON with object keys sorted at every depth, so key order never changes a fingerprint. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
