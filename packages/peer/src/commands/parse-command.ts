import { ALL_PEERS, peerTarget, type SyncCommand } from '@recipe-mesh/engine';

/**
 * What one input line asks for.
 */
export type ParsedLine =
  | { readonly kind: 'command'; readonly command: SyncCommand }
  | { readonly kind: 'help' }
  | { readonly kind: 'quit' }
  | { readonly kind: 'empty' }
  | { readonly kind: 'usage'; readonly message: string };

export const USAGE = {
  ls: 'usage: ls p | ls r [all|<peer id>] | ls a',
  create: 'usage: create r <name>|<ingredients>|<instructions>',
  publish: 'usage: publish r <id>|all',
} as const;

function usage(message: string): ParsedLine {
  return { kind: 'usage', message };
}

function command(value: SyncCommand): ParsedLine {
  return { kind: 'command', command: value };
}

function parseList(args: readonly string[]): ParsedLine {
  const [scope, target, ...rest] = args;
  if (rest.length > 0) return usage(USAGE.ls);

  switch (scope) {
    case 'p':
      return target === undefined ? command({ type: 'list-peers' }) : usage(USAGE.ls);
    case 'a':
      return target === undefined ? command({ type: 'list-all' }) : usage(USAGE.ls);
    case 'r':
      if (target === undefined) return command({ type: 'list-local' });
      if (target === 'all') return command({ type: 'request-from', target: ALL_PEERS });
      return command({ type: 'request-from', target: peerTarget(target) });
    default:
      return usage(USAGE.ls);
  }
}

function parseCreate(rest: string): ParsedLine {
  const match = /^r\s+(.*)$/s.exec(rest);
  if (!match) return usage(USAGE.create);

  const parts = (match[1] ?? '').split('|');
  if (parts.length < 3) return usage(USAGE.create);

  const [name = '', ingredients = '', ...instructions] = parts;
  return command({
    type: 'create-record',
    fields: { name, ingredients, instructions: instructions.join('|') },
  });
}

function parsePublish(args: readonly string[]): ParsedLine {
  const [scope, selector, ...rest] = args;
  if (scope !== 'r' || selector === undefined || rest.length > 0) return usage(USAGE.publish);

  if (selector === 'all') {
    return command({ type: 'publish-owned', selector: { kind: 'all' } });
  }
  if (!/^\d+$/.test(selector)) {
    return usage(`invalid id "${selector}": ${USAGE.publish}`);
  }
  return command({ type: 'publish-owned', selector: { kind: 'one', id: Number(selector) } });
}

/**
 * Turn a line of user input into an intent.
 *
 * Never throws: anything that is not a known command becomes a usage message.
 *
 * @example
 * ```typescript
 * parseCommand('create r Soup|water, salt|boil');
 * // { kind: 'command', command: { type: 'create-record', fields: { name: 'Soup', ... } } }
 * parseCommand('ls r peer-b');
 * // { kind: 'command', command: { type: 'request-from', target: { kind: 'peer', peerId: 'peer-b' } } }
 * ```
 */
export function parseCommand(line: string): ParsedLine {
  const trimmed = line.trim();
  if (trimmed === '') return { kind: 'empty' };

  const [verb = '', ...args] = trimmed.split(/\s+/);
  switch (verb) {
    case 'ls':
      return parseList(args);
    case 'create':
      return parseCreate(trimmed.slice(verb.length).trimStart());
    case 'publish':
      return parsePublish(args);
    case 'help':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return usage(`unknown command "${verb}", type "help" for the list of commands`);
  }
}
