/**
 * ls / queue 커맨드 공통 옵션과 selector 구성
 */
import { Command } from 'commander';
import { RESOURCE_KINDS } from '@nodepick/shared';
import type { ResourceKind } from '@nodepick/shared';
import {
  InvalidSelectorError,
  NodeSelector,
  buildSelectionGraph,
  createResourceTypeSelector,
  parseSelectionArgs,
} from '@nodepick/core';
import type { Logger, Manifest } from '@nodepick/core';
import type { SelectionSpec } from '@nodepick/shared';

export interface SelectionCommandOptions {
  manifest: string;
  select?: string[];
  exclude?: string[];
  resourceType?: string[];
  greedy?: boolean;
}

/** 커맨드에 공통 선택 옵션 추가 */
export function withSelectionOptions(command: Command): Command {
  return command
    .requiredOption('-m, --manifest <path>', 'manifest JSON 파일 경로')
    .option('-s, --select <spec...>', '선택할 노드 (공백: union, 콤마: intersection)')
    .option('--exclude <spec...>', '제외할 노드 (greedy)')
    .option('--resource-type <type...>', `결과에 남길 리소스 종류 (${RESOURCE_KINDS.join(' | ')})`)
    .option('--greedy', '부모가 일부만 선택된 test도 포함');
}

function isResourceKind(value: string): value is ResourceKind {
  return (RESOURCE_KINDS as readonly string[]).includes(value);
}

export function parseResourceTypes(values: readonly string[]): ResourceKind[] {
  return values.map((value) => {
    if (!isResourceKind(value)) {
      throw new InvalidSelectorError(
        `Unknown resource type: ${value}. Must be one of [${RESOURCE_KINDS.join(', ')}]`,
      );
    }
    return value;
  });
}

/** 옵션으로 selector와 spec 트리 구성 */
export function buildSelection(
  manifest: Manifest,
  options: SelectionCommandOptions,
  logger?: Logger,
): { selector: NodeSelector; spec: SelectionSpec } {
  const graph = buildSelectionGraph(manifest);
  const selectorOptions = logger ? { logger } : {};

  const selector =
    options.resourceType && options.resourceType.length > 0
      ? createResourceTypeSelector(graph, manifest, parseResourceTypes(options.resourceType), selectorOptions)
      : new NodeSelector(graph, manifest, selectorOptions);

  const spec = parseSelectionArgs({
    select: options.select,
    exclude: options.exclude,
    greedy: options.greedy ?? false,
  });

  return { selector, spec };
}
