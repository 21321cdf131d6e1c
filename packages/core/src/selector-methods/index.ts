/**
 * Selector Methods - method 이름 + 인자로 matcher 조회
 * matcher는 후보 id 집합과 패턴 값을 받아 일치하는 부분집합을 반환
 */
import type { GraphMember, NodeId } from '@nodepick/shared';
import { matchesWildcard } from '@nodepick/shared';
import { InvalidSelectorError } from '../errors/index';
import type { Manifest } from '../manifest/index';

export interface SelectorMethod {
  search(included: ReadonlySet<NodeId>, value: string): Set<NodeId>;
}

export type MethodArguments = Readonly<Record<string, string>>;

export type SelectorMethodFactory = (manifest: Manifest, args: MethodArguments) => SelectorMethod;

/** predicate 기반 matcher 생성 */
function memberFilter(
  manifest: Manifest,
  predicate: (member: GraphMember, value: string) => boolean,
): SelectorMethod {
  return {
    search(included, value) {
      const result = new Set<NodeId>();
      for (const uniqueId of included) {
        const member = manifest.lookup(uniqueId);
        if (member && predicate(member, value)) result.add(uniqueId);
      }
      return result;
    },
  };
}

/**
 * fqn 매칭
 * - 이름이 정확히 일치하면 선택
 * - 아니면 점(.)으로 분리한 세그먼트 단위 prefix 매칭 (`*` 허용)
 */
export function matchesQualifiedName(fqn: readonly string[], selector: string): boolean {
  if (fqn[fqn.length - 1] === selector) return true;

  const flatFqn = fqn.flatMap((segment) => segment.split('.'));
  const flatSelector = selector.split('.');
  if (flatSelector.length > flatFqn.length) return false;

  return flatSelector.every((part, idx) => matchesWildcard(part, flatFqn[idx] ?? ''));
}

function matchesPath(path: string, selector: string): boolean {
  if (!path) return false;
  if (matchesWildcard(selector, path)) return true;
  const prefix = selector.endsWith('/') ? selector : `${selector}/`;
  return path.startsWith(prefix);
}

/** source:{source_name}[.{table}] 또는 source:{package}.{source_name}.{table} */
function matchesSource(member: GraphMember, selector: string): boolean {
  if (member.memberKind !== 'source') return false;

  const parts = selector.split('.');
  let pkg = '*';
  let source = '*';
  let table = '*';
  if (parts.length === 1) {
    [source = '*'] = parts;
  } else if (parts.length === 2) {
    [source = '*', table = '*'] = parts;
  } else if (parts.length === 3) {
    [pkg = '*', source = '*', table = '*'] = parts;
  } else {
    throw new InvalidSelectorError(
      `Invalid source selector value "${selector}". Sources must be of the form ` +
        '${source_name}, ${source_name}.${target_name}, or ${package_name}.${source_name}.${target_name}',
      'source',
    );
  }

  return (
    matchesWildcard(pkg, member.packageName) &&
    matchesWildcard(source, member.sourceName) &&
    matchesWildcard(table, member.name)
  );
}

/** exposure:{name} 또는 exposure:{package}.{name} */
function matchesExposure(member: GraphMember, selector: string): boolean {
  if (member.memberKind !== 'exposure') return false;

  const parts = selector.split('.');
  if (parts.length === 1) return matchesWildcard(selector, member.name);
  if (parts.length === 2) {
    const [pkg = '*', name = '*'] = parts;
    return matchesWildcard(pkg, member.packageName) && matchesWildcard(name, member.name);
  }
  throw new InvalidSelectorError(
    `Invalid exposure selector value "${selector}". Exposures must be of the form ` +
      '${exposure_name} or ${exposure_package.exposure_name}',
    'exposure',
  );
}

export const BUILTIN_METHODS: Readonly<Record<string, SelectorMethodFactory>> = {
  fqn: (manifest) =>
    memberFilter(
      manifest,
      (member, value) => member.memberKind === 'node' && matchesQualifiedName(member.fqn, value),
    ),
  tag: (manifest) =>
    memberFilter(manifest, (member, value) => member.tags.some((tag) => matchesWildcard(value, tag))),
  resource_type: (manifest) =>
    memberFilter(manifest, (member, value) => member.resourceType === value),
  path: (manifest) => memberFilter(manifest, (member, value) => matchesPath(member.path, value)),
  package: (manifest) =>
    memberFilter(manifest, (member, value) => matchesWildcard(value, member.packageName)),
  source: (manifest) => memberFilter(manifest, matchesSource),
  exposure: (manifest) => memberFilter(manifest, matchesExposure),
};

export class MethodRegistry {
  private readonly factories: Map<string, SelectorMethodFactory>;

  constructor(
    private readonly manifest: Manifest,
    factories: Readonly<Record<string, SelectorMethodFactory>> = BUILTIN_METHODS,
  ) {
    this.factories = new Map(Object.entries(factories));
  }

  /** 커스텀 method 등록 (같은 이름은 덮어씀) */
  register(name: string, factory: SelectorMethodFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  methodNames(): string[] {
    return [...this.factories.keys()];
  }

  getMethod(name: string, args: MethodArguments = {}): SelectorMethod {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new InvalidSelectorError(`Unknown selector method: ${name}`, name);
    }
    return factory(this.manifest, args);
  }
}
