/**
 * Manifest - graph member 조회
 * node / source / exposure 세 컬렉션을 하나의 tagged union 조회로 통합
 */
import type { GraphMember, ManifestNode, NodeId } from '@nodepick/shared';
import { InternalSelectionError, ManifestFormatError } from '../errors/index';
import { ManifestSchema } from './schema';

export { ManifestSchema } from './schema';
export type { ManifestDocument, ManifestDocumentInput } from './schema';

export class Manifest {
  private readonly members = new Map<NodeId, GraphMember>();

  constructor(members: Iterable<GraphMember>) {
    for (const member of members) {
      if (this.members.has(member.uniqueId)) {
        throw new ManifestFormatError(`Duplicate unique id in manifest: ${member.uniqueId}`);
      }
      this.members.set(member.uniqueId, member);
    }
  }

  get size(): number {
    return this.members.size;
  }

  ids(): NodeId[] {
    return [...this.members.keys()];
  }

  values(): GraphMember[] {
    return [...this.members.values()];
  }

  lookup(uniqueId: NodeId): GraphMember | undefined {
    return this.members.get(uniqueId);
  }

  /** 조회 실패는 상위 그래프 구성 버그이므로 치명적 에러 */
  resolve(uniqueId: NodeId): GraphMember {
    const member = this.members.get(uniqueId);
    if (!member) {
      throw new InternalSelectionError(`Node ${uniqueId} not found in the manifest!`);
    }
    return member;
  }

  /** 실행 노드(node 컬렉션)만 조회 */
  lookupNode(uniqueId: NodeId): ManifestNode | undefined {
    const member = this.members.get(uniqueId);
    return member?.memberKind === 'node' ? member : undefined;
  }

  /**
   * 선택 그래프 포함 여부
   * - source / exposure: enabled
   * - node: enabled 이면서 비어있지 않음
   */
  isGraphMember(uniqueId: NodeId): boolean {
    const member = this.resolve(uniqueId);
    switch (member.memberKind) {
      case 'source':
      case 'exposure':
        return member.enabled;
      case 'node':
        return member.enabled && !member.empty;
    }
  }
}

/** unique id 형식: {resource}.{package}.{...} */
function packageFromUniqueId(uniqueId: NodeId): string {
  return uniqueId.split('.')[1] ?? '';
}

/**
 * JSON manifest 문서 검증 후 Manifest 생성
 * packageName / fqn 누락 시 unique id에서 유도
 */
export function loadManifest(document: unknown): Manifest {
  const parsed = ManifestSchema.safeParse(document);
  if (!parsed.success) {
    throw new ManifestFormatError(
      'Invalid manifest document',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { nodes, sources, exposures } = parsed.data;
  const members: GraphMember[] = [];

  for (const [uniqueId, node] of Object.entries(nodes)) {
    const packageName = node.packageName ?? packageFromUniqueId(uniqueId);
    members.push({
      ...node,
      memberKind: 'node',
      uniqueId,
      packageName,
      fqn: node.fqn ?? [packageName, node.name],
    });
  }

  for (const [uniqueId, source] of Object.entries(sources)) {
    const packageName = source.packageName ?? packageFromUniqueId(uniqueId);
    members.push({
      ...source,
      memberKind: 'source',
      resourceType: 'source',
      uniqueId,
      packageName,
      fqn: source.fqn ?? [packageName, source.sourceName, source.name],
    });
  }

  for (const [uniqueId, exposure] of Object.entries(exposures)) {
    const packageName = exposure.packageName ?? packageFromUniqueId(uniqueId);
    members.push({
      ...exposure,
      memberKind: 'exposure',
      resourceType: 'exposure',
      uniqueId,
      packageName,
      fqn: exposure.fqn ?? [packageName, exposure.name],
    });
  }

  return new Manifest(members);
}
