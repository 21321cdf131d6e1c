/**
 * 테스트용 manifest / 그래프 / 로거 픽스처
 */
import type {
  GraphMember,
  LogLevel,
  ManifestExposure,
  ManifestNode,
  ManifestSource,
} from '@nodepick/shared';
import { buildSelectionGraph } from '../graph-index/index';
import type { SelectionGraph } from '../graph-index/index';
import type { Logger } from '../logger/index';
import { Manifest } from '../manifest/index';

export const PACKAGE = 'shop';

export function makeNode(
  name: string,
  overrides: Partial<Omit<ManifestNode, 'memberKind'>> = {},
): ManifestNode {
  const resourceType = overrides.resourceType ?? 'model';
  return {
    memberKind: 'node',
    uniqueId: `${resourceType}.${PACKAGE}.${name}`,
    name,
    packageName: PACKAGE,
    fqn: [PACKAGE, name],
    path: `${resourceType}s/${name}.sql`,
    tags: [],
    enabled: true,
    empty: false,
    dependsOn: [],
    resourceType,
    ...overrides,
  };
}

export function makeTest(name: string, dependsOn: readonly string[]): ManifestNode {
  return makeNode(name, { resourceType: 'test', dependsOn });
}

export function makeSource(
  sourceName: string,
  name: string,
  overrides: Partial<Omit<ManifestSource, 'memberKind' | 'resourceType'>> = {},
): ManifestSource {
  return {
    memberKind: 'source',
    resourceType: 'source',
    uniqueId: `source.${PACKAGE}.${sourceName}.${name}`,
    name,
    sourceName,
    packageName: PACKAGE,
    fqn: [PACKAGE, sourceName, name],
    path: `sources/${sourceName}.yml`,
    tags: [],
    enabled: true,
    dependsOn: [],
    ...overrides,
  };
}

export function makeExposure(
  name: string,
  overrides: Partial<Omit<ManifestExposure, 'memberKind' | 'resourceType'>> = {},
): ManifestExposure {
  return {
    memberKind: 'exposure',
    resourceType: 'exposure',
    uniqueId: `exposure.${PACKAGE}.${name}`,
    name,
    packageName: PACKAGE,
    fqn: [PACKAGE, name],
    path: 'exposures.yml',
    tags: [],
    enabled: true,
    dependsOn: [],
    ...overrides,
  };
}

export function buildFixture(members: readonly GraphMember[]): { manifest: Manifest; graph: SelectionGraph } {
  const manifest = new Manifest(members);
  return { manifest, graph: buildSelectionGraph(manifest) };
}

export interface MemoryLogger extends Logger {
  readonly entries: { level: LogLevel; message: string }[];
  messages(level: LogLevel): string[];
}

/** 로그를 메모리에 기록하는 Logger */
export function createMemoryLogger(): MemoryLogger {
  const entries: { level: LogLevel; message: string }[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}
