/**
 * Manifest 파일 로더
 * JSON 파싱 실패와 스키마 오류 모두 ManifestFormatError로 보고
 */
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ManifestFormatError, loadManifest } from '@nodepick/core';
import type { Manifest } from '@nodepick/core';

export function readManifestFile(filePath: string): Manifest {
  const absolutePath = resolve(filePath);
  const text = readFileSync(absolutePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestFormatError(`Manifest is not valid JSON: ${absolutePath} (${reason})`);
  }

  return loadManifest(document);
}
