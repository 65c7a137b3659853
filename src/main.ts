#!/usr/bin/env node
import { runCli } from './cli/run.js';

async function main() {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => controller.abort(`interrupted (${signal})`);
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const { exitCode } = await runCli(process.argv.slice(2), { signal: controller.signal });
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
  process.exitCode = exitCode;
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
