/**
 * nodepick CLI 메인 진입점
 */
import { createProgram } from './program';

const program = createProgram();
program.parse(process.argv);

// 커맨드 없이 실행 시 help 출력
if (process.argv.length <= 2) {
  program.help();
}
