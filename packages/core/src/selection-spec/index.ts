/**
 * Selection Spec - spec 트리 생성과 텍스트 파싱
 *
 * 텍스트 문법 (criterion):
 *   [@][N+]method[.arg[=value]]:value[+N]
 *   - method 생략 시 fqn
 *   - 공백: union, 콤마: intersection
 */
import type {
  SelectionComposite,
  SelectionCriteria,
  SelectionSpec,
  SetOperator,
} from '@nodepick/shared';
import { DEFAULTS } from '@nodepick/shared';
import { InvalidSelectorError } from '../errors/index';

export interface CriteriaModifiers {
  methodArguments?: Readonly<Record<string, string>>;
  parents?: boolean;
  parentsDepth?: number;
  children?: boolean;
  childrenDepth?: number;
  childrensParents?: boolean;
  greedy?: boolean;
  expectExists?: boolean;
  raw?: string;
}

export interface CompositeOptions {
  expectExists?: boolean;
  raw?: string;
}

export function criteria(
  method: string,
  value: string,
  modifiers: CriteriaModifiers = {},
): SelectionCriteria {
  return Object.freeze({
    type: 'criteria',
    method,
    methodArguments: Object.freeze({ ...modifiers.methodArguments }),
    value,
    parents: modifiers.parents ?? false,
    ...(modifiers.parentsDepth !== undefined ? { parentsDepth: modifiers.parentsDepth } : {}),
    children: modifiers.children ?? false,
    ...(modifiers.childrenDepth !== undefined ? { childrenDepth: modifiers.childrenDepth } : {}),
    childrensParents: modifiers.childrensParents ?? false,
    greedy: modifiers.greedy ?? false,
    expectExists: modifiers.expectExists ?? false,
    raw: modifiers.raw ?? `${method}:${value}`,
  } satisfies SelectionCriteria);
}

function composite(
  operator: SetOperator,
  components: readonly SelectionSpec[],
  options: CompositeOptions,
): SelectionComposite {
  return Object.freeze({
    type: 'composite',
    operator,
    components: Object.freeze([...components]),
    expectExists: options.expectExists ?? false,
    raw: options.raw ?? components.map((component) => component.raw).join(` ${operator} `),
  } satisfies SelectionComposite);
}

export function union(components: readonly SelectionSpec[], options: CompositeOptions = {}): SelectionComposite {
  return composite('union', components, options);
}

export function intersection(
  components: readonly SelectionSpec[],
  options: CompositeOptions = {},
): SelectionComposite {
  return composite('intersection', components, options);
}

export function difference(
  components: readonly SelectionSpec[],
  options: CompositeOptions = {},
): SelectionComposite {
  return composite('difference', components, options);
}

const RAW_CRITERION_PATTERN =
  /^(?<childrensParents>@)?(?<parents>(?<parentsDepth>\d*)\+)?(?:(?<method>[\w.=-]+):)?(?<value>.*?)(?<children>\+(?<childrenDepth>\d*))?$/;

function parseDepth(raw: string | undefined): number | undefined {
  return raw ? Number.parseInt(raw, 10) : undefined;
}

/** `method.key=value.flag` -> ['method', { key: 'value', flag: 'true' }] */
function parseMethod(raw: string | undefined): [string, Record<string, string>] {
  if (!raw) return [DEFAULTS.DEFAULT_METHOD, {}];

  const [method = '', ...argParts] = raw.split('.');
  const args: Record<string, string> = {};
  for (const part of argParts) {
    const [key = '', value = 'true'] = part.split('=');
    if (!key) throw new InvalidSelectorError(`Invalid method arguments in "${raw}"`, method);
    args[key] = value;
  }
  return [method, args];
}

/** 단일 criterion 텍스트 파싱 */
export function parseCriterion(raw: string, options: { greedy?: boolean } = {}): SelectionCriteria {
  const groups = RAW_CRITERION_PATTERN.exec(raw)?.groups;
  const value = groups?.['value'];
  if (!groups || !value) {
    throw new InvalidSelectorError(`Invalid selector spec "${raw}"`);
  }

  const childrensParents = groups['childrensParents'] !== undefined;
  const parents = groups['parents'] !== undefined;
  if (childrensParents && parents) {
    throw new InvalidSelectorError(
      `Invalid node spec ${raw} - "@" prefix and "+" prefix are not compatible`,
    );
  }

  const [method, methodArguments] = parseMethod(groups['method']);

  return criteria(method, value, {
    methodArguments,
    parents,
    parentsDepth: parseDepth(groups['parentsDepth']),
    children: groups['children'] !== undefined,
    childrenDepth: parseDepth(groups['childrenDepth']),
    childrensParents,
    greedy: options.greedy ?? false,
    raw,
  });
}

function parseUnion(components: readonly string[], expectExists: boolean, greedy: boolean): SelectionComposite {
  const rawSpecs = components.flatMap((component) => component.split(/\s+/)).filter(Boolean);

  const unionComponents = rawSpecs.map((rawSpec) =>
    intersection(
      rawSpec.split(',').map((part) => parseCriterion(part, { greedy })),
      { expectExists, raw: rawSpec },
    ),
  );

  return union(unionComponents, { raw: components.join(' ') });
}

export interface SelectionArgs {
  select?: readonly string[];
  exclude?: readonly string[];
  /** 포함 spec에도 greedy expansion 적용 */
  greedy?: boolean;
}

/**
 * --select / --exclude 인자로 spec 트리 구성
 * - select 미지정 시 DEFAULTS.DEFAULT_INCLUDES 사용 (매칭 없어도 경고 없음)
 * - exclude는 greedy: 부모 중 하나라도 제외되면 해당 test도 제외
 */
export function parseSelectionArgs(args: SelectionArgs): SelectionSpec {
  const hasSelect = args.select !== undefined && args.select.length > 0;
  const included = parseUnion(
    hasSelect ? (args.select ?? []) : DEFAULTS.DEFAULT_INCLUDES,
    hasSelect,
    args.greedy ?? false,
  );

  if (!args.exclude || args.exclude.length === 0) return included;

  const excluded = parseUnion(args.exclude, true, true);
  return difference([included, excluded]);
}
