/**
 * queue 커맨드
 * 선택된 노드의 실행 순서를 출력 (부모가 먼저)
 * 사용법: nodepick queue --manifest ./manifest.json --select "orders+"
 */
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { NodeId } from '@nodepick/shared';
import type { Logger, Manifest } from '@nodepick/core';
import { readManifestFile } from '../utils/manifest-loader';
import { buildSelection, withSelectionOptions } from '../utils/selection-options';
import type { SelectionCommandOptions } from '../utils/selection-options';

/** 선택 결과의 실행 순서 */
export function planExecution(
  manifest: Manifest,
  options: SelectionCommandOptions,
  logger?: Logger,
): NodeId[] {
  const { selector, spec } = buildSelection(manifest, options, logger);
  return selector.getGraphQueue(spec).order();
}

export function createQueueCommand(): Command {
  return withSelectionOptions(
    new Command('queue').description('선택된 노드의 실행 순서를 출력합니다'),
  ).action((options: SelectionCommandOptions) => {
    const spinner = ora('manifest 로드 중...').start();
    try {
      const manifest = readManifestFile(options.manifest);
      spinner.succeed(chalk.green(`manifest 로드 완료: ${manifest.size}개 노드`));

      const order = planExecution(manifest, options);
      order.forEach((uniqueId, idx) => {
        const member = manifest.resolve(uniqueId);
        console.log(`${chalk.dim(`${idx + 1}.`.padStart(4))} ${uniqueId} ${chalk.dim(`(${member.resourceType})`)}`);
      });
      console.log(chalk.dim(`  총 ${order.length}개`));
    } catch (error) {
      spinner.fail(chalk.red('실행 순서 계산 실패'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
}
