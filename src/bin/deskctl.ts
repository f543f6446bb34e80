#!/usr/bin/env node
// src/bin/deskctl.ts
import { loadConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { formatResponse, parseCliArgs, USAGE } from '../lib/ipc/cli.js';
import { sendCommand } from '../lib/ipc/client.js';

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'usage-error') {
    console.error(`error: ${parsed.message}\n\n${USAGE}`);
    return 1;
  }

  const { socketPath } = loadConfig();
  try {
    const out = formatResponse(await sendCommand(socketPath, parsed.command));
    for (const line of out.stdout) console.log(line);
    for (const line of out.stderr) console.error(line);
    return out.exitCode;
  } catch (err) {
    console.error(`✗ Error: ${errorMessage(err)}`);
    return 1;
  }
}

main().then(
  code => process.exit(code),
  err => {
    console.error(`✗ Error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
