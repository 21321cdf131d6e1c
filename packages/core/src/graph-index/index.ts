/**
 * Graph Index - 선택용 의존 그래프 질의
 * graphology DirectedGraph 래퍼. 엣지 방향은 부모 -> 자식 (dependsOn -> 의존 노드)
 * 모든 질의는 순수 함수이며 내부 그래프를 변경하지 않음
 */
import { DirectedGraph } from 'graphology';
import type { NodeId } from '@nodepick/shared';
import { InternalSelectionError, ManifestFormatError } from '../errors/index';
import type { Manifest } from '../manifest/index';

type TraversalDirection = 'UPSTREAM' | 'DOWNSTREAM';

export class SelectionGraph {
  private readonly graph: DirectedGraph;

  constructor(graph: DirectedGraph) {
    this.graph = graph;
  }

  /** 노드 목록과 (parent, child) 엣지 목록으로 생성 */
  static fromEdges(
    nodes: Iterable<NodeId>,
    edges: Iterable<readonly [NodeId, NodeId]>,
  ): SelectionGraph {
    const graph = new DirectedGraph();
    for (const node of nodes) graph.mergeNode(node);
    for (const [parent, child] of edges) graph.mergeEdge(parent, child);
    return new SelectionGraph(graph);
  }

  get order(): number {
    return this.graph.order;
  }

  nodes(): Set<NodeId> {
    return new Set(this.graph.nodes());
  }

  hasNode(id: NodeId): boolean {
    return this.graph.hasNode(id);
  }

  /** (parent, child) 엣지 목록 */
  edges(): [NodeId, NodeId][] {
    const edges: [NodeId, NodeId][] = [];
    this.graph.forEachEdge((_edge, _attrs, source, target) => {
      edges.push([source, target]);
    });
    return edges;
  }

  parents(id: NodeId): NodeId[] {
    this.assertNode(id);
    return this.graph.inNeighbors(id);
  }

  children(id: NodeId): NodeId[] {
    this.assertNode(id);
    return this.graph.outNeighbors(id);
  }

  /** ids만 포함하는 induced subgraph. 그래프에 없는 id는 무시 */
  subgraph(ids: Iterable<NodeId>): SelectionGraph {
    const keep = new Set(ids);
    const sub = new DirectedGraph();

    this.graph.forEachNode((node) => {
      if (keep.has(node)) sub.addNode(node);
    });
    this.graph.forEachEdge((_edge, _attrs, source, target) => {
      if (keep.has(source) && keep.has(target)) sub.mergeEdge(source, target);
    });

    return new SelectionGraph(sub);
  }

  ancestors(id: NodeId, maxDepth?: number): Set<NodeId> {
    return this.traverse(id, 'UPSTREAM', maxDepth);
  }

  descendants(id: NodeId, maxDepth?: number): Set<NodeId> {
    return this.traverse(id, 'DOWNSTREAM', maxDepth);
  }

  selectParents(ids: Iterable<NodeId>, maxDepth?: number): Set<NodeId> {
    const result = new Set<NodeId>();
    for (const id of ids) {
      for (const ancestor of this.ancestors(id, maxDepth)) result.add(ancestor);
    }
    return result;
  }

  selectChildren(ids: Iterable<NodeId>, maxDepth?: number): Set<NodeId> {
    const result = new Set<NodeId>();
    for (const id of ids) {
      for (const descendant of this.descendants(id, maxDepth)) result.add(descendant);
    }
    return result;
  }

  /**
   * `@` 연산자: 선택 노드와 그 모든 자손, 그리고 그들의 모든 조상
   */
  selectChildrensParents(ids: Iterable<NodeId>): Set<NodeId> {
    const selected = [...ids];
    const base = this.selectChildren(selected);
    for (const id of selected) base.add(id);

    const result = this.selectParents(base);
    for (const id of base) result.add(id);
    return result;
  }

  /** 한 단계 전방 이웃 (전이 폐포 아님) */
  selectSuccessors(ids: Iterable<NodeId>): Set<NodeId> {
    const result = new Set<NodeId>();
    for (const id of ids) {
      for (const child of this.children(id)) result.add(child);
    }
    return result;
  }

  /**
   * 선택되지 않은 노드를 제거한 그래프
   * 제거되는 노드의 부모들을 자식들에 직접 연결하여 실행 순서 제약을 유지
   */
  getSubsetGraph(selected: Iterable<NodeId>): SelectionGraph {
    const include = new Set(selected);
    const subset = this.cloneGraph();

    for (const node of this.graph.nodes()) {
      if (include.has(node)) continue;

      const sources = subset.inNeighbors(node);
      const targets = subset.outNeighbors(node);
      for (const source of sources) {
        for (const target of targets) {
          if (source !== target) subset.mergeEdge(source, target);
        }
      }
      subset.dropNode(node);
    }

    return new SelectionGraph(subset);
  }

  /** BFS - maxDepth 생략 시 무제한, 1 = 직접 이웃 */
  private traverse(start: NodeId, direction: TraversalDirection, maxDepth?: number): Set<NodeId> {
    this.assertNode(start);

    const visited = new Set<NodeId>([start]);
    const found = new Set<NodeId>();
    const queue: { nodeId: NodeId; depth: number }[] = [{ nodeId: start, depth: 0 }];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      if (maxDepth !== undefined && current.depth >= maxDepth) continue;

      const neighbors =
        direction === 'UPSTREAM'
          ? this.graph.inNeighbors(current.nodeId)
          : this.graph.outNeighbors(current.nodeId);

      for (const neighbor of neighbors) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        found.add(neighbor);
        queue.push({ nodeId: neighbor, depth: current.depth + 1 });
      }
    }

    return found;
  }

  private assertNode(id: NodeId): void {
    if (!this.graph.hasNode(id)) {
      throw new InternalSelectionError(`Node ${id} not found in the graph!`);
    }
  }

  private cloneGraph(): DirectedGraph {
    const clone = new DirectedGraph();
    this.graph.forEachNode((node) => clone.addNode(node));
    this.graph.forEachEdge((_edge, _attrs, source, target) => clone.mergeEdge(source, target));
    return clone;
  }
}

/**
 * Manifest 전체(비활성 포함)의 dependsOn으로 그래프 구성
 * manifest에 없는 부모를 참조하면 ManifestFormatError
 */
export function buildSelectionGraph(manifest: Manifest): SelectionGraph {
  const edges: [NodeId, NodeId][] = [];

  for (const member of manifest.values()) {
    for (const parent of member.dependsOn) {
      if (!manifest.lookup(parent)) {
        throw new ManifestFormatError(
          `${member.uniqueId} depends on ${parent}, which is not in the manifest`,
        );
      }
      edges.push([parent, member.uniqueId]);
    }
  }

  return SelectionGraph.fromEdges(manifest.ids(), edges);
}
