#!/usr/bin/env node
import { USAGE, loadConfig } from '../lib/config';
import { KeyReader } from '../lib/keys';
import { runMultiPing } from '../lib/multiping';
import { createPingProber } from '../lib/prober';

const CTRL_C = '\x03';

async function main(): Promise<number> {
  const loaded = loadConfig(process.argv.slice(2));
  if (!loaded.ok) {
    console.error(`Error: ${loaded.error}`);
    return 1;
  }
  if (loaded.help) {
    console.log(USAGE);
    return 0;
  }

  const { config } = loaded;
  const stdin = process.stdin;
  const interactive = stdin.isTTY === true && !config.verbose;

  let keys: KeyReader | undefined;
  const onInterrupt = (chunk: Buffer): void => {
    if (chunk.toString('utf8').includes(CTRL_C)) {
      stdin.setRawMode(false);
      process.exit(130);
    }
  };

  if (interactive) {
    stdin.setRawMode(true);
    stdin.on('data', onInterrupt);
    keys = new KeyReader(stdin);
  }

  try {
    const result = await runMultiPing(config, {
      prober: createPingProber({ command: config.pingCommand }),
      output: process.stdout,
      keys
    });
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    return 0;
  } finally {
    if (interactive) {
      keys?.close();
      stdin.off('data', onInterrupt);
      stdin.setRawMode(false);
      stdin.pause();
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
