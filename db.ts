#!/usr/bin/env node
import repl from 'repl';
import process from 'process';

import { closeAndExitCode, openFromArgv, runCommand } from './lib';
import type { Table } from './lib';

function start(table: Table) {
  const server = repl.start({
    prompt: 'pagedb > ',
    eval: (evalCmd, _, __, callback) => {
      const { output, exit } = runCommand(table, evalCmd);
      if (exit) {
        // closing emits 'exit', which ends the process before another prompt
        server.close();
        return;
      }
      return callback(null, output);
    },
    writer: output => (typeof output === 'string' ? output : ''),
  });

  server.on('exit', () => {
    process.exit(closeAndExitCode(table));
  });
}

const opened = openFromArgv(process.argv);
if (typeof opened === 'number') {
  process.exit(opened);
} else {
  start(opened);
}
