import { promises as fs } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { ArtifactManifest, ArtifactManifestStore } from '../../../domain/glitch-video/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

const entrySchema = z.object({
  artifact: z.string(),
  parametersHash: z.string(),
  upstream: z.record(z.string()),
  revision: z.string(),
  builtAt: z.string(),
});

const manifestSchema = z
  .object({
    version: z.literal(1),
    stages: z
      .object({
        'glitch-calm': entrySchema,
        'glitch-climax': entrySchema,
        assemble: entrySchema,
        motion: entrySchema,
        transitions: entrySchema,
      })
      .partial(),
  });

/**
 * Stage fingerprints stored next to the artifacts. A manifest that is missing or does not parse
 * is treated as empty, which rebuilds every stage.
 */
export class JsonManifestStore implements ArtifactManifestStore {
  private readonly logger = createChildLogger({ module: 'JsonManifestStore' });

  public constructor(private readonly manifestPath: string) {}

  public async load(): Promise<ArtifactManifest> {
    let raw: string;
    try {
      raw = await fs.readFile(this.manifestPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return {};
      }
      throw AppError.io('manifest.read-failed', error, { manifestPath: this.manifestPath });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ manifestPath: this.manifestPath, error }, 'Manifest is not valid JSON; rebuilding all stages');
      return {};
    }

    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        { manifestPath: this.manifestPath, issues: parsed.error.issues },
        'Manifest has an unexpected shape; rebuilding all stages',
      );
      return {};
    }

    return parsed.data.stages;
  }

  public async save(manifest: ArtifactManifest): Promise<void> {
    const body = JSON.stringify({ version: 1, stages: manifest }, null, 2);
    const tempPath = `${this.manifestPath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.manifestPath), { recursive: true });
      await fs.writeFile(tempPath, `${body}\n`, 'utf8');
      await fs.rename(tempPath, this.manifestPath);
    } catch (error) {
      throw AppError.io('manifest.write-failed', error, { manifestPath: this.manifestPath });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
