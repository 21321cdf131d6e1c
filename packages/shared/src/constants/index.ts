// 리소스 종류 - manifest에 등장하는 graph member 타입
export const RESOURCE_KINDS = [
  'model',
  'test',
  'seed',
  'snapshot',
  'analysis',
  'operation',
  'source',
  'exposure',
] as const;

// source/exposure를 제외한 실행 노드 종류
export const NODE_RESOURCE_KINDS = [
  'model',
  'test',
  'seed',
  'snapshot',
  'analysis',
  'operation',
] as const;

// Manifest 내 member 컬렉션 구분
export const MEMBER_KINDS = ['node', 'source', 'exposure'] as const;

// 간접 선택(indirect selection) 대상 리소스 종류
export const INDIRECT_SELECTION_KINDS = ['test'] as const;

// Composite spec 집합 연산자
export const SET_OPERATORS = ['union', 'intersection', 'difference'] as const;

// 내장 selector method 이름
export const SELECTOR_METHODS = [
  'fqn',
  'tag',
  'resource_type',
  'path',
  'package',
  'source',
  'exposure',
] as const;

// 로그 레벨 (낮은 순)
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

// 기본 설정값
export const DEFAULTS = {
  LOG_LEVEL: 'info',
  LOG_LEVEL_ENV: 'NODEPICK_LOG_LEVEL',
  DEFAULT_METHOD: 'fqn',
  DEFAULT_INCLUDES: ['fqn:*', 'source:*', 'exposure:*'],
  UNUSED_NODE_SUMMARY_LIMIT: 3,
  GREEDY_FLAG: '--greedy',
} as const;
