import { logger, routeLogsToStderr } from '@contract-delta/shared';
import { main } from './lib/program';

// stdout carries only the summary
routeLogsToStderr();

main(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected CLI failure', error);
    process.exitCode = 1;
  });
