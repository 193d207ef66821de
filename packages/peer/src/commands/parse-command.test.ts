import { ALL_PEERS, peerTarget } from '@recipe-mesh/engine';
import { describe, expect, it } from 'vitest';
import { parseCommand, USAGE } from './parse-command.js';

describe('parseCommand', () => {
  it('should map the list commands', () => {
    expect(parseCommand('ls p')).toEqual({ kind: 'command', command: { type: 'list-peers' } });
    expect(parseCommand('ls r')).toEqual({ kind: 'command', command: { type: 'list-local' } });
    expect(parseCommand('ls a')).toEqual({ kind: 'command', command: { type: 'list-all' } });
  });

  it('should map ls r with a target to a request', () => {
    expect(parseCommand('ls r all')).toEqual({
      kind: 'command',
      command: { type: 'request-from', target: ALL_PEERS },
    });
    expect(parseCommand('  ls   r   peer-b  ')).toEqual({
      kind: 'command',
      command: { type: 'request-from', target: peerTarget('peer-b') },
    });
  });

  it('should split create arguments on the pipe', () => {
    expect(parseCommand('create r Tomato Soup|tomatoes, salt|simmer for 20 minutes')).toEqual({
      kind: 'command',
      command: {
        type: 'create-record',
        fields: { name: 'Tomato Soup', ingredients: 'tomatoes, salt', instructions: 'simmer for 20 minutes' },
      },
    });
  });

  it('should keep extra pipes in the instructions', () => {
    const parsed = parseCommand('create r Soup|water|boil | stir');

    expect(parsed.kind === 'command' ? parsed.command : undefined).toEqual({
      type: 'create-record',
      fields: { name: 'Soup', ingredients: 'water', instructions: 'boil | stir' },
    });
  });

  it('should require three create parts', () => {
    expect(parseCommand('create r Soup|water')).toEqual({ kind: 'usage', message: USAGE.create });
    expect(parseCommand('create r')).toEqual({ kind: 'usage', message: USAGE.create });
    expect(parseCommand('create x Soup|water|boil')).toEqual({ kind: 'usage', message: USAGE.create });
  });

  it('should map publish commands', () => {
    expect(parseCommand('publish r 3')).toEqual({
      kind: 'command',
      command: { type: 'publish-owned', selector: { kind: 'one', id: 3 } },
    });
    expect(parseCommand('publish r all')).toEqual({
      kind: 'command',
      command: { type: 'publish-owned', selector: { kind: 'all' } },
    });
  });

  it('should reject ids that are not numbers', () => {
    expect(parseCommand('publish r soup')).toEqual({
      kind: 'usage',
      message: `invalid id "soup": ${USAGE.publish}`,
    });
    expect(parseCommand('publish r -1').kind).toBe('usage');
    expect(parseCommand('publish r')).toEqual({ kind: 'usage', message: USAGE.publish });
  });

  it('should recognise help, quit and exit', () => {
    expect(parseCommand('help')).toEqual({ kind: 'help' });
    expect(parseCommand('quit')).toEqual({ kind: 'quit' });
    expect(parseCommand('exit')).toEqual({ kind: 'quit' });
  });

  it('should treat blank lines as empty', () => {
    expect(parseCommand('   ')).toEqual({ kind: 'empty' });
  });

  it('should never throw on unknown input', () => {
    expect(parseCommand('ls')).toEqual({ kind: 'usage', message: USAGE.ls });
    expect(parseCommand('ls p extra')).toEqual({ kind: 'usage', message: USAGE.ls });
    expect(parseCommand('dance')).toEqual({
      kind: 'usage',
      message: 'unknown command "dance", type "help" for the list of commands',
    });
  });
});
