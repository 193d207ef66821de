import { describe, expect, it } from 'vitest';
import type { GossipDelivery } from './types.js';
import { createMemoryGossipNetwork } from './memory-gossip.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('MemoryGossipNetwork', () => {
  it('should deliver a publish to every other member', async () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    const b = network.join('peer-b');
    const c = network.join('peer-c');
    const received: Record<string, GossipDelivery[]> = { a: [], b: [], c: [] };
    a.messages$.subscribe((d) => received['a']?.push(d));
    b.messages$.subscribe((d) => received['b']?.push(d));
    c.messages$.subscribe((d) => received['c']?.push(d));

    await a.publish(bytes('hello'));

    expect(received['a']).toEqual([]);
    expect(received['b']).toEqual([{ from: 'peer-a', payload: bytes('hello') }]);
    expect(received['c']).toEqual([{ from: 'peer-a', payload: bytes('hello') }]);
    expect(a.getPublished()).toEqual([bytes('hello')]);
  });

  it('should not share payload buffers between members', async () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    const b = network.join('peer-b');
    const received: GossipDelivery[] = [];
    b.messages$.subscribe((d) => received.push(d));
    const payload = bytes('abc');

    await a.publish(payload);
    payload[0] = 0x7a;

    expect(received[0]?.payload).toEqual(bytes('abc'));
  });

  it('should track peers as members join and leave', async () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    network.join('peer-b');
    const c = network.join('peer-c');

    expect([...a.peers()].sort()).toEqual(['peer-b', 'peer-c']);

    await c.close();

    expect([...a.peers()]).toEqual(['peer-b']);
    expect(network.memberIds()).toEqual(['peer-a', 'peer-b']);
  });

  it('should reject a second member with the same identity', () => {
    const network = createMemoryGossipNetwork();
    network.join('peer-a');

    expect(() => network.join('peer-a')).toThrow('Peer peer-a already joined');
  });

  it('should complete the inbound stream on close', async () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    let completed = false;
    a.messages$.subscribe({ complete: () => (completed = true) });

    await a.close();

    expect(completed).toBe(true);
    expect(a.isClosed).toBe(true);
    await expect(a.publish(bytes('late'))).rejects.toThrow('Channel peer-a is closed');
  });

  it('should error the inbound stream on failure', () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    const errors: unknown[] = [];
    a.messages$.subscribe({ error: (error: unknown) => errors.push(error) });

    a.fail(new Error('socket reset'));

    expect(errors).toHaveLength(1);
    expect(network.memberIds()).toEqual([]);
  });

  it('should fail the next publish on request', async () => {
    const network = createMemoryGossipNetwork();
    const a = network.join('peer-a');
    const b = network.join('peer-b');
    const received: GossipDelivery[] = [];
    b.messages$.subscribe((d) => received.push(d));
    a.failNextPublish(new Error('no route'));

    await expect(a.publish(bytes('x'))).rejects.toThrow('no route');
    await a.publish(bytes('y'));

    expect(received.map((d) => new TextDecoder().decode(d.payload))).toEqual(['y']);
  });
});
