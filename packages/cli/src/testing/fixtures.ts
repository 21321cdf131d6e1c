import { fileURLToPath } from 'node:url';
import { createLogger } from '@nodepick/core';
import type { Manifest } from '@nodepick/core';
import { readManifestFile } from '../utils/manifest-loader';

export const SAMPLE_MANIFEST_PATH = fileURLToPath(new URL('./sample-manifest.json', import.meta.url));

export function loadSampleManifest(): Manifest {
  return readManifestFile(SAMPLE_MANIFEST_PATH);
}

export const silentLogger = createLogger('Test', 'silent');
