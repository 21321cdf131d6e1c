/**
 * nodepick CLI 구성
 * Commander.js 기반
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { createLsCommand } from './commands/ls';
import { createQueueCommand } from './commands/queue';

export { listSelection, formatSelection } from './commands/ls';
export { planExecution } from './commands/queue';
export { readManifestFile } from './utils/manifest-loader';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('nodepick')
    .description(
      chalk.bold('nodepick') +
        ' — DAG 빌드 노드 선택 도구\n' +
        chalk.dim('selection spec을 실행할 노드 집합으로 변환합니다.'),
    )
    .version('0.1.0', '-v, --version', '버전 출력');

  // 커맨드 등록
  program.addCommand(createLsCommand());
  program.addCommand(createQueueCommand());

  // 알 수 없는 커맨드 처리
  program.on('command:*', (operands: string[]) => {
    console.error(chalk.red(`알 수 없는 커맨드: ${operands.join(' ')}`));
    console.log(chalk.dim('nodepick --help 를 실행하여 사용법을 확인하세요.'));
    process.exit(1);
  });

  return program;
}
