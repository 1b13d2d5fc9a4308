/**
 * Model registry
 *
 * MODEL_ARTIFACT_PATH unset → placeholder handle.
 * Set → JSON artifact read and validated on every load, so a replaced file
 * takes effect on the next pipeline run.
 */

import { readFile } from 'node:fs/promises';
import { ModelUnavailableError, errorMessage } from '../../common/errors.js';
import { ModelArtifactSchema, type ModelHandle, type ModelRegistry } from './flare-model.types.js';

export class PlaceholderModelRegistry implements ModelRegistry {
  async loadModel(): Promise<ModelHandle> {
    return { kind: 'placeholder' };
  }
}

export class FileModelRegistry implements ModelRegistry {
  constructor(private readonly artifactPath: string) {}

  async loadModel(): Promise<ModelHandle> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.artifactPath, 'utf-8'));
    } catch (err) {
      throw new ModelUnavailableError(`Cannot read model artifact ${this.artifactPath}: ${errorMessage(err)}`);
    }

    const parsed = ModelArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ModelUnavailableError(`Invalid model artifact ${this.artifactPath}: ${issues}`);
    }

    return { kind: 'loaded', source: this.artifactPath, artifact: parsed.data };
  }
}

export function createModelRegistry(artifactPath: string | null): ModelRegistry {
  return artifactPath ? new FileModelRegistry(artifactPath) : new PlaceholderModelRegistry();
}
