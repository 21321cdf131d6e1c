/**
 * Node Selector - selection spec 트리를 실행할 노드 집합으로 변환
 *
 * 1. leaf criterion마다 matcher 실행 + 이웃 확장(+, @) + test 노드 expansion
 * 2. composite는 하위 결과를 집합 연산으로 결합한 뒤 indirect 노드 재검사
 * 3. 최종 direct 집합을 matcher 전략으로 필터링
 */
import type {
  GraphMember,
  NodeId,
  ResourceKind,
  SelectionBundle,
  SelectionCriteria,
  SelectionResult,
  SelectionSpec,
} from '@nodepick/shared';
import {
  DEFAULTS,
  INDIRECT_SELECTION_KINDS,
  combineSets,
  isSubset,
  setDifference,
  sortedIds,
} from '@nodepick/shared';
import { InvalidSelectorError } from '../errors/index';
import type { SelectionGraph } from '../graph-index/index';
import { GraphQueue } from '../graph-queue/index';
import { createLogger } from '../logger/index';
import type { Logger } from '../logger/index';
import type { Manifest } from '../manifest/index';
import { MethodRegistry } from '../selector-methods/index';

/** 최종 결과에 남길 노드 판정 전략 */
export type NodeMatcher = (member: GraphMember) => boolean;

export const matchAll: NodeMatcher = () => true;

/** 지정한 리소스 종류만 남기는 matcher */
export function resourceTypeMatcher(kinds: Iterable<ResourceKind>): NodeMatcher {
  const allowed = new Set<ResourceKind>(kinds);
  return (member) => allowed.has(member.resourceType);
}

/**
 * 직접 선택되지 않았지만 부모가 선택된 경우 간접 선택 대상인지
 * 현재는 test 노드만 해당
 */
export function canSelectIndirectly(member: GraphMember): boolean {
  return (INDIRECT_SELECTION_KINDS as readonly ResourceKind[]).includes(member.resourceType);
}

export function alertNonExistence(logger: Logger, rawSpec: string, nodes: ReadonlySet<NodeId>): void {
  if (nodes.size === 0) {
    logger.warn(`The selection criterion '${rawSpec}' does not match any nodes`);
  }
}

/**
 * 부모 누락으로 제외된 test 노드 안내
 * info: 앞의 일부 이름 + 나머지 개수, debug: 전체 목록
 */
export function alertUnusedNodes(
  logger: Logger,
  unusedNodeNames: readonly string[],
  greedyFlag: string = DEFAULTS.GREEDY_FLAG,
): void {
  const limit = DEFAULTS.UNUSED_NODE_SUMMARY_LIMIT;
  const header = 'Some tests were excluded because at least one parent is missing:';
  const footer = `Use the ${greedyFlag} flag to include them`;

  const debugMsg = [header, ...unusedNodeNames.map((name) => `  - ${name}`), footer].join('\n');
  const summaryMsg =
    unusedNodeNames.length <= limit + 1
      ? debugMsg
      : [
          header,
          ...unusedNodeNames.slice(0, limit).map((name) => `  - ${name}`),
          `  - and ${unusedNodeNames.length - limit} more`,
          footer,
        ].join('\n');

  logger.info(summaryMsg);
  logger.debug(debugMsg);
}

export interface NodeSelectorOptions {
  methods?: MethodRegistry;
  matcher?: NodeMatcher;
  logger?: Logger;
  /** 제외된 test를 강제로 포함시키는 CLI 플래그 이름 (안내 메시지용) */
  greedyFlag?: string;
}

export class NodeSelector {
  readonly fullGraph: SelectionGraph;
  /** 활성 + 비어있지 않은 member만 포함하는 선택용 그래프 */
  readonly graph: SelectionGraph;
  readonly manifest: Manifest;

  private readonly methods: MethodRegistry;
  private readonly matcher: NodeMatcher;
  private readonly logger: Logger;
  private readonly greedyFlag: string;

  constructor(graph: SelectionGraph, manifest: Manifest, options: NodeSelectorOptions = {}) {
    this.fullGraph = graph;
    this.manifest = manifest;
    this.methods = options.methods ?? new MethodRegistry(manifest);
    this.matcher = options.matcher ?? matchAll;
    this.logger = options.logger ?? createLogger('Selector');
    this.greedyFlag = options.greedyFlag ?? DEFAULTS.GREEDY_FLAG;

    const graphMembers = [...graph.nodes()].filter((uniqueId) => manifest.isGraphMember(uniqueId));
    this.graph = graph.subgraph(graphMembers);
  }

  /** criterion의 matcher로 명시적으로 포함되는 노드 선택 */
  selectIncluded(includedNodes: ReadonlySet<NodeId>, spec: SelectionCriteria): Set<NodeId> {
    const method = this.methods.getMethod(spec.method, spec.methodArguments);
    return method.search(includedNodes, spec.value);
  }

  /**
   * 단일 criterion이 가리키는 노드
   * - matcher로 직접 포함 노드 수집
   * - 수식어(+, @)에 따른 이웃 수집
   * - test 노드 expansion
   */
  getNodesFromCriteria(spec: SelectionCriteria): SelectionBundle {
    let collected: Set<NodeId>;
    try {
      collected = this.selectIncluded(this.graph.nodes(), spec);
    } catch (error) {
      if (!(error instanceof InvalidSelectorError)) throw error;

      const validSelectors = this.methods.methodNames();
      if (validSelectors.includes(spec.method)) {
        this.logger.info(error.message);
      } else {
        this.logger.info(
          `The '${spec.method}' selector specified in ${spec.raw} is invalid. ` +
            `Must be one of [${validSelectors.join(', ')}]`,
        );
      }
      return { direct: new Set(), indirect: new Set() };
    }

    const neighbors = this.collectSpecifiedNeighbors(spec, collected);
    const selected = new Set([...collected, ...neighbors]);
    return this.expandSelection(selected, spec.greedy);
  }

  /**
   * 수식어에 따라 추가로 포함할 노드 (selected와 겹칠 수 있음)
   */
  collectSpecifiedNeighbors(spec: SelectionCriteria, selected: ReadonlySet<NodeId>): Set<NodeId> {
    const additional = new Set<NodeId>();
    const addAll = (ids: Iterable<NodeId>) => {
      for (const id of ids) additional.add(id);
    };

    if (spec.childrensParents) addAll(this.graph.selectChildrensParents(selected));
    if (spec.parents) addAll(this.graph.selectParents(selected, spec.parentsDepth));
    if (spec.children) addAll(this.graph.selectChildren(selected, spec.childrenDepth));

    return additional;
  }

  /**
   * 선택 노드의 한 단계 후손 중 test 노드 expansion
   * - greedy: 부모 하나만 선택돼도 direct (제외 spec용)
   * - non-greedy: 모든 부모가 선택돼야 direct, 아니면 indirect로 보류 (포함 spec용)
   */
  expandSelection(selected: ReadonlySet<NodeId>, greedy: boolean): SelectionBundle {
    const direct = new Set(selected);
    const indirect = new Set<NodeId>();

    for (const uniqueId of this.graph.selectSuccessors(selected)) {
      const node = this.manifest.lookupNode(uniqueId);
      if (!node || !canSelectIndirectly(node)) continue;

      if (greedy || isSubset(node.dependsOn, selected)) {
        direct.add(uniqueId);
      } else {
        indirect.add(uniqueId);
      }
    }

    return { direct, indirect };
  }

  /** 보류된 indirect 노드 중 모든 부모가 이제 선택된 노드를 승격 (단일 패스) */
  incorporateIndirectNodes(direct: ReadonlySet<NodeId>, indirect: ReadonlySet<NodeId>): Set<NodeId> {
    const selected = new Set(direct);

    for (const uniqueId of indirect) {
      const node = this.manifest.lookupNode(uniqueId);
      if (node && isSubset(node.dependsOn, selected)) {
        selected.add(uniqueId);
      }
    }

    return selected;
  }

  /**
   * composite(union / intersection / difference)는 하위 결과를 재귀적으로 결합하고
   * criterion은 그래프에서 직접 해석
   */
  selectNodesRecursively(spec: SelectionSpec): SelectionBundle {
    switch (spec.type) {
      case 'criteria': {
        const bundle = this.getNodesFromCriteria(spec);
        if (spec.expectExists) alertNonExistence(this.logger, spec.raw, bundle.direct);
        return bundle;
      }

      case 'composite': {
        const bundles = spec.components.map((component) => this.selectNodesRecursively(component));

        // indirect 노드는 해당 하위 결과의 direct와 함께 있어야 의미가 있음
        const directSets = bundles.map(({ direct }) => direct);
        const indirectSets = bundles.map(({ direct, indirect }) => new Set([...direct, ...indirect]));

        const initialDirect = combineSets(spec.operator, directSets);
        const indirect = combineSets(spec.operator, indirectSets);
        const direct = this.incorporateIndirectNodes(initialDirect, indirect);

        if (spec.expectExists) alertNonExistence(this.logger, spec.raw, direct);
        return { direct, indirect };
      }
    }
  }

  /** 필터링 전 최종 선택 결과. indirectOnly는 direct와 서로소 */
  selectNodes(spec: SelectionSpec): SelectionResult {
    const { direct, indirect } = this.selectNodesRecursively(spec);
    return { direct, indirectOnly: setDifference(indirect, direct) };
  }

  /** matcher 전략에 맞는 노드만 남김 */
  filterSelection(selected: Iterable<NodeId>): Set<NodeId> {
    const result = new Set<NodeId>();
    for (const uniqueId of selected) {
      if (this.matcher(this.manifest.resolve(uniqueId))) result.add(uniqueId);
    }
    return result;
  }

  /** 선택 -> 필터링. 부모 누락으로 빠진 test는 안내 로그 */
  getSelected(spec: SelectionSpec): Set<NodeId> {
    const { direct, indirectOnly } = this.selectNodes(spec);
    const filtered = this.filterSelection(direct);

    if (indirectOnly.size > 0) {
      const filteredUnused = this.filterSelection(indirectOnly);
      if (filteredUnused.size > 0) {
        const names = sortedIds(filteredUnused).map((uniqueId) => this.manifest.resolve(uniqueId).name);
        alertUnusedNodes(this.logger, names, this.greedyFlag);
      }
    }

    return filtered;
  }

  /** 선택 결과의 실행 순서를 관리하는 큐 (전체 그래프 기준 의존 관계 유지) */
  getGraphQueue(spec: SelectionSpec): GraphQueue {
    const selected = this.getSelected(spec);
    const subsetGraph = this.fullGraph.getSubsetGraph(selected);
    return new GraphQueue(subsetGraph, selected);
  }
}

/** 지정한 리소스 종류만 반환하는 selector */
export function createResourceTypeSelector(
  graph: SelectionGraph,
  manifest: Manifest,
  resourceTypes: Iterable<ResourceKind>,
  options: Omit<NodeSelectorOptions, 'matcher'> = {},
): NodeSelector {
  return new NodeSelector(graph, manifest, { ...options, matcher: resourceTypeMatcher(resourceTypes) });
}
