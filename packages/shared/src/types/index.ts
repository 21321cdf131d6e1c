import type {
  RESOURCE_KINDS,
  NODE_RESOURCE_KINDS,
  MEMBER_KINDS,
  SET_OPERATORS,
  SELECTOR_METHODS,
  LOG_LEVELS,
} from '../constants/index';

// === 기본 유틸리티 타입 ===

/** 배열 타입에서 원소 타입 추출 */
export type ArrayElement<T extends readonly unknown[]> = T[number];

/** 그래프 노드 식별자 (실행 단위로 안정적) */
export type NodeId = string;

/** 리소스 종류 유니온 */
export type ResourceKind = ArrayElement<typeof RESOURCE_KINDS>;

/** 실행 노드 종류 유니온 */
export type NodeResourceKind = ArrayElement<typeof NODE_RESOURCE_KINDS>;

/** Member 컬렉션 구분 유니온 */
export type MemberKind = ArrayElement<typeof MEMBER_KINDS>;

/** 집합 연산자 유니온 */
export type SetOperator = ArrayElement<typeof SET_OPERATORS>;

/** 내장 selector method 이름 유니온 */
export type SelectorMethodName = ArrayElement<typeof SELECTOR_METHODS>;

/** 로그 레벨 유니온 */
export type LogLevel = ArrayElement<typeof LOG_LEVELS>;

// === Manifest 엔티티 타입 ===

interface GraphMemberBase {
  uniqueId: NodeId;
  name: string;
  packageName: string;
  fqn: readonly string[];
  path: string;
  tags: readonly string[];
  enabled: boolean;
  /** 직접 부모 노드 목록 (순서 유지) */
  dependsOn: readonly NodeId[];
}

/** 실행 가능한 노드 (model, test, seed ...) */
export interface ManifestNode extends GraphMemberBase {
  memberKind: 'node';
  resourceType: NodeResourceKind;
  /** materialize할 내용이 없는 노드 */
  empty: boolean;
}

/** 외부 source 테이블 */
export interface ManifestSource extends GraphMemberBase {
  memberKind: 'source';
  resourceType: 'source';
  sourceName: string;
}

/** 다운스트림 exposure (dashboard, application 등) */
export interface ManifestExposure extends GraphMemberBase {
  memberKind: 'exposure';
  resourceType: 'exposure';
}

export type GraphMember = ManifestNode | ManifestSource | ManifestExposure;

// === Selection Spec 타입 ===

/** 단일 selection 조건 (leaf) */
export interface SelectionCriteria {
  readonly type: 'criteria';
  readonly method: string;
  readonly methodArguments: Readonly<Record<string, string>>;
  readonly value: string;
  readonly parents: boolean;
  /** 생략 시 무제한 */
  readonly parentsDepth?: number;
  readonly children: boolean;
  readonly childrenDepth?: number;
  readonly childrensParents: boolean;
  readonly greedy: boolean;
  readonly expectExists: boolean;
  readonly raw: string;
}

/** 하위 spec들을 집합 연산으로 결합하는 노드 */
export interface SelectionComposite {
  readonly type: 'composite';
  readonly operator: SetOperator;
  readonly components: readonly SelectionSpec[];
  readonly expectExists: boolean;
  readonly raw: string;
}

export type SelectionSpec = SelectionCriteria | SelectionComposite;

/** 최종 선택 결과 */
export interface SelectionResult {
  direct: Set<NodeId>;
  /** indirect 후보 중 direct로 승격되지 못한 노드 */
  indirectOnly: Set<NodeId>;
}

/** 한 평가 단계의 direct/indirect 쌍 */
export interface SelectionBundle {
  direct: Set<NodeId>;
  indirect: Set<NodeId>;
}
