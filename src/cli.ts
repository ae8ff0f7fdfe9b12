import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
