/**
 * Graph Queue - 선택된 노드의 실행 순서 관리
 * 부모가 모두 완료된 노드만 꺼낼 수 있음
 * 우선순위: 자손이 많은 노드 먼저, 동률이면 id 순
 */
import type { NodeId } from '@nodepick/shared';
import { InternalSelectionError } from '../errors/index';
import type { SelectionGraph } from '../graph-index/index';

export class GraphQueue {
  private readonly remainingParents = new Map<NodeId, Set<NodeId>>();
  private readonly scores = new Map<NodeId, number>();
  private ready: NodeId[] = [];
  private readonly running = new Set<NodeId>();
  private readonly done = new Set<NodeId>();

  constructor(
    readonly graph: SelectionGraph,
    readonly selected: ReadonlySet<NodeId>,
  ) {
    for (const node of graph.nodes()) {
      this.scores.set(node, graph.descendants(node).size);
      const parents = new Set(graph.parents(node));
      this.remainingParents.set(node, parents);
      if (parents.size === 0) this.ready.push(node);
    }
    this.sortReady();
  }

  /** 아직 완료되지 않은 노드 수 */
  get size(): number {
    return this.remainingParents.size - this.done.size;
  }

  get inProgress(): ReadonlySet<NodeId> {
    return this.running;
  }

  /** 실행 가능한 다음 노드. 없으면 undefined */
  get(): NodeId | undefined {
    const next = this.ready.shift();
    if (next !== undefined) this.running.add(next);
    return next;
  }

  markDone(id: NodeId): void {
    if (!this.running.delete(id)) {
      throw new InternalSelectionError(`Node ${id} was marked done but was never started`);
    }
    this.done.add(id);

    for (const child of this.graph.children(id)) {
      const parents = this.remainingParents.get(child);
      if (!parents) continue;
      parents.delete(id);
      if (parents.size === 0) this.ready.push(child);
    }
    this.sortReady();
  }

  /** 대기 중인 노드 없음 (실행 중 노드는 남아 있을 수 있음) */
  empty(): boolean {
    return this.ready.length === 0;
  }

  isFinished(): boolean {
    return this.size === 0;
  }

  /** 별도 큐로 전체 실행 순서를 계산 (이 큐의 상태는 변경하지 않음) */
  order(): NodeId[] {
    const replay = new GraphQueue(this.graph, this.selected);
    const result: NodeId[] = [];
    for (let next = replay.get(); next !== undefined; next = replay.get()) {
      result.push(next);
      replay.markDone(next);
    }
    return result;
  }

  private sortReady(): void {
    this.ready = this.ready.sort((a, b) => {
      const diff = (this.scores.get(b) ?? 0) - (this.scores.get(a) ?? 0);
      if (diff !== 0) return diff;
      return a < b ? -1 : a > b ? 1 : 0;
    });
  }
}
