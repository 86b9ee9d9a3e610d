#!/usr/bin/env tsx
import { runCli } from './lib.js';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
