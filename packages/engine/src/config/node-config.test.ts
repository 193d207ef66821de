import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/mesh-error.js';
import { isLogLevel, parseNodeConfig } from './node-config.js';

describe('parseNodeConfig', () => {
  it('should apply defaults', () => {
    expect(parseNodeConfig({ nodeId: 'peer-a' })).toEqual({
      nodeId: 'peer-a',
      port: 4001,
      host: '0.0.0.0',
      storagePath: './recipes.json',
      bootstrapPeers: [],
      maxPayloadBytes: 1048576,
      logLevel: 'info',
    });
  });

  it('should coerce numeric strings', () => {
    const config = parseNodeConfig({ nodeId: 'peer-a', port: '4002', maxPayloadBytes: '65536' });

    expect(config.port).toBe(4002);
    expect(config.maxPayloadBytes).toBe(65536);
  });

  it('should accept bootstrap peers as host:port', () => {
    const config = parseNodeConfig({ nodeId: 'peer-a', bootstrapPeers: [' 10.0.0.2:4001', 'kitchen.local:4100'] });

    expect(config.bootstrapPeers).toEqual(['10.0.0.2:4001', 'kitchen.local:4100']);
  });

  it('should list every invalid setting', () => {
    let caught: unknown;
    try {
      parseNodeConfig({ nodeId: 'peer-a', port: 70000, bootstrapPeers: ['localhost:99999'] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.path)).toEqual(['port', 'bootstrapPeers.0']);
      expect(caught.issues[1]?.message).toBe('port must be between 1 and 65535');
    }
  });

  it('should require a node id without whitespace', () => {
    expect(() => parseNodeConfig({})).toThrow(ConfigError);
    expect(() => parseNodeConfig({ nodeId: 'peer a' })).toThrow(ConfigError);
  });

  it('should reject unknown log levels', () => {
    expect(() => parseNodeConfig({ nodeId: 'peer-a', logLevel: 'trace' })).toThrow(ConfigError);
  });
});

describe('isLogLevel', () => {
  it('should narrow known levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
