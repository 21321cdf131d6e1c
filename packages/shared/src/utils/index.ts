import type { SetOperator } from '../types/index';

/**
 * 집합 연산자로 여러 집합을 결합
 * difference는 좌결합 (첫 집합 - 나머지 전부)
 * 입력 집합은 변경하지 않음
 */
export function combineSets<T>(operator: SetOperator, sets: readonly Set<T>[]): Set<T> {
  const [first, ...rest] = sets;
  if (!first) return new Set();

  const result = new Set(first);

  switch (operator) {
    case 'union':
      for (const set of rest) {
        for (const item of set) result.add(item);
      }
      break;

    case 'intersection':
      for (const item of first) {
        if (!rest.every((set) => set.has(item))) result.delete(item);
      }
      break;

    case 'difference':
      for (const set of rest) {
        for (const item of set) result.delete(item);
      }
      break;
  }

  return result;
}

/** a ⊆ b 여부 */
export function isSubset<T>(a: Iterable<T>, b: ReadonlySet<T>): boolean {
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

/** a \ b */
export function setDifference<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  return new Set([...a].filter((item) => !b.has(item)));
}

/** 정렬된 배열로 변환 (출력/로그의 결정론 보장) */
export function sortedIds(ids: Iterable<string>): string[] {
  return [...ids].sort();
}

/**
 * `*` 와일드카드 패턴 매칭
 * `*`를 제외한 정규식 메타문자는 리터럴로 취급
 */
export function matchesWildcard(pattern: string, candidate: string): boolean {
  if (!pattern.includes('*')) return pattern === candidate;
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`).test(candidate);
}
