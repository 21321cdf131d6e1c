/**
 * ls 커맨드
 * selection 결과 노드를 출력
 * 사용법: nodepick ls --manifest ./manifest.json --select "+orders" --exclude "tag:slow"
 */
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { GraphMember } from '@nodepick/shared';
import { sortedIds } from '@nodepick/shared';
import type { Logger, Manifest } from '@nodepick/core';
import { readManifestFile } from '../utils/manifest-loader';
import { buildSelection, withSelectionOptions } from '../utils/selection-options';
import type { SelectionCommandOptions } from '../utils/selection-options';

type OutputFormat = 'text' | 'json';

/** 선택된 member 목록 (unique id 순) */
export function listSelection(
  manifest: Manifest,
  options: SelectionCommandOptions,
  logger?: Logger,
): GraphMember[] {
  const { selector, spec } = buildSelection(manifest, options, logger);
  return sortedIds(selector.getSelected(spec)).map((uniqueId) => manifest.resolve(uniqueId));
}

export function formatSelection(members: readonly GraphMember[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      members.map(({ uniqueId, name, resourceType }) => ({ uniqueId, name, resourceType })),
      null,
      2,
    );
  }
  return members.map((member) => member.uniqueId).join('\n');
}

export function createLsCommand(): Command {
  return withSelectionOptions(
    new Command('ls').description('선택된 노드 목록을 출력합니다'),
  )
    .option('-o, --output <format>', '출력 형식 (text | json)', 'text')
    .action((options: SelectionCommandOptions & { output: string }) => {
      if (options.output !== 'text' && options.output !== 'json') {
        console.error(chalk.red(`알 수 없는 형식: ${options.output}`));
        process.exit(1);
        return;
      }

      const spinner = ora('manifest 로드 중...').start();
      try {
        const manifest = readManifestFile(options.manifest);
        spinner.succeed(chalk.green(`manifest 로드 완료: ${manifest.size}개 노드`));

        const members = listSelection(manifest, options);
        if (members.length === 0) {
          console.log(chalk.yellow('선택된 노드가 없습니다.'));
          return;
        }
        console.log(formatSelection(members, options.output));
      } catch (error) {
        spinner.fail(chalk.red('선택 실패'));
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
