/**
 * 선택 엔진 에러 계층
 * InternalSelectionError만 치명적이며, 나머지는 호출 측에서 복구 가능
 */
export class NodepickError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** 내부 불변식 위반 (manifest에 없는 노드 등) - 해당 실행은 중단 */
export class InternalSelectionError extends NodepickError {}

/** 알 수 없는 selector method 또는 잘못된 selection 문법 */
export class InvalidSelectorError extends NodepickError {
  constructor(
    message: string,
    readonly method?: string,
  ) {
    super(message);
  }
}

/** Manifest 문서 형식 오류 */
export class ManifestFormatError extends NodepickError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
  }
}
