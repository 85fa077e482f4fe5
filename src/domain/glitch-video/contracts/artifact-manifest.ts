import type { StageName } from '../entities/pipeline-artifacts.js';

export interface ManifestEntry {
  readonly artifact: string;
  readonly parametersHash: string;
  readonly upstream: Readonly<Record<string, string>>;
  readonly revision: string;
  readonly builtAt: string;
}

export type ArtifactManifest = Partial<Record<StageName, ManifestEntry>>;

export interface ArtifactManifestStore {
  load(): Promise<ArtifactManifest>;
  save(manifest: ArtifactManifest): Promise<void>;
}
