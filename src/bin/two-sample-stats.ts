import { main } from '../cli/main';
import { consoleOutput, LinePrompt } from '../cli/io';

main(process.argv.slice(2), {
  out: consoleOutput,
  createPrompt: () => new LinePrompt(process.stdin, process.stdout),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
