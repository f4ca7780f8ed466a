#!/usr/bin/env tsx
import { createInterface } from './program';

async function main(): Promise<void> {
  const controller = new AbortController();
  // a second interrupt falls through to the default handler
  process.once('SIGINT', () => {
    console.error('Interrupted; waiting for running assets to finish');
    controller.abort();
  });
  const program = createInterface({ signal: controller.signal });
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
