import { createInterface } from 'node:readline';
import type { SyncEngine } from '@recipe-mesh/engine';
import { formatResult, HELP_TEXT } from './commands/format.js';
import { parseCommand } from './commands/parse-command.js';

export interface ReplOptions {
  engine: SyncEngine;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Prompt shown before each line; empty for piped input */
  prompt?: string;
  /** Treat the input as a TTY (line editing, Ctrl+C handled by the REPL) */
  terminal?: boolean;
}

/** Why the REPL returned */
export type ReplExit = 'quit' | 'end-of-input' | 'interrupted' | 'engine-stopped';

/**
 * Read commands line by line and print their results until the user quits,
 * the input ends, or the engine stops.
 */
export async function runRepl(options: ReplOptions): Promise<ReplExit> {
  const { engine, output, prompt = '', terminal = false } = options;
  const rl = createInterface({ input: options.input, output, prompt, terminal });
  const print = (text: string) => output.write(`${text}\n`);

  let exit: ReplExit = 'end-of-input';
  const stateSubscription = engine.state$.subscribe((state) => {
    if (state !== 'running') {
      exit = 'engine-stopped';
      rl.close();
    }
  });
  rl.on('SIGINT', () => {
    exit = 'interrupted';
    rl.close();
  });

  try {
    if (prompt) rl.prompt();
    for await (const line of rl) {
      const parsed = parseCommand(line);
      switch (parsed.kind) {
        case 'empty':
          break;
        case 'help':
          print(HELP_TEXT);
          break;
        case 'usage':
          print(parsed.message);
          break;
        case 'quit':
          exit = 'quit';
          return exit;
        case 'command':
          print(formatResult(await engine.execute(parsed.command)));
          break;
      }
      if (prompt) rl.prompt();
    }
    return exit;
  } finally {
    stateSubscription.unsubscribe();
    rl.close();
  }
}
