import { afterEach, describe, expect, it } from 'vitest';
import { MemoryGossipNetwork } from '../gossip/memory-gossip.js';
import { ALL_PEERS, peerTarget } from '../types/message.js';
import { recipe, settle, sortByKey, startTestNode, stopAll, type TestNode } from './mesh-harness.js';

describe('mesh replication', () => {
  let nodes: TestNode[] = [];

  async function start(network: MemoryGossipNetwork, ...ids: string[]): Promise<TestNode[]> {
    const started = await Promise.all(ids.map((id) => startTestNode(network, id)));
    nodes.push(...started);
    return started;
  }

  afterEach(async () => {
    await stopAll(...nodes);
    nodes = [];
  });

  it('should propagate a published record to a subscribed peer', async () => {
    const [a, b] = await start(new MemoryGossipNetwork(), 'peer-a', 'peer-b');
    if (!a || !b) throw new Error('nodes not started');

    await a.engine.execute({
      type: 'create-record',
      fields: { name: 'Soup', ingredients: 'water|salt', instructions: 'boil' },
    });
    await a.engine.execute({ type: 'publish-owned', selector: { kind: 'one', id: 1 } });
    await settle(a, b);

    expect(b.store.listAll()).toEqual([
      {
        id: 1,
        name: 'Soup',
        ingredients: 'water|salt',
        instructions: 'boil',
        publisherId: 'peer-a',
        published: true,
      },
    ]);
    expect(Array.from(b.store.listLocal())).toEqual([]);
    expect(b.events).toEqual([{ type: 'records-merged', from: 'peer-a', received: 1, added: 1 }]);
  });

  it('should collect the union of every peer on request-from all', async () => {
    const network = new MemoryGossipNetwork();
    const [a, b, c] = await start(network, 'peer-a', 'peer-b', 'peer-c');
    if (!a || !b || !c) throw new Error('nodes not started');

    await a.engine.execute({ type: 'create-record', fields: { name: 'Soup' } });
    await a.engine.execute({ type: 'create-record', fields: { name: 'Bread' } });
    await b.engine.execute({ type: 'create-record', fields: { name: 'Salad' } });
    // c already holds one of a's records, so the union collapses it
    await a.engine.execute({ type: 'publish-owned', selector: { kind: 'one', id: 1 } });
    await settle(a, b, c);

    await c.engine.execute({ type: 'request-from', target: ALL_PEERS });
    await settle(a, b, c);

    const expected = sortByKey([
      { ...recipe('peer-a', 1, 'Soup'), published: true },
      recipe('peer-a', 2, 'Bread'),
      recipe('peer-b', 1, 'Salad'),
    ]);
    expect(sortByKey(c.store.listAll())).toEqual(expected);
    expect(a.events).toContainEqual({ type: 'query-answered', to: 'peer-c', records: 2 });
    expect(b.events).toContainEqual({ type: 'query-answered', to: 'peer-c', records: 1 });

    // responses addressed to c are not merged by the other responder
    expect(b.store.listAll().filter((r) => r.publisherId === 'peer-a')).toHaveLength(1);
    expect(b.events).toContainEqual({ type: 'announce-ignored', from: 'peer-a', target: peerTarget('peer-c') });

    await c.engine.execute({ type: 'request-from', target: ALL_PEERS });
    await settle(a, b, c);

    expect(c.store.size).toBe(3);
  });

  it('should split a large query response across several announces', async () => {
    const network = new MemoryGossipNetwork();
    const a = await startTestNode(network, 'peer-a', { maxPayloadBytes: 4096 });
    const c = await startTestNode(network, 'peer-c', { maxPayloadBytes: 4096 });
    nodes.push(a, c);

    for (let i = 1; i <= 10; i++) {
      await a.engine.execute({
        type: 'create-record',
        fields: { name: `Recipe ${i}`, ingredients: 'x'.repeat(500) },
      });
    }

    await c.engine.execute({ type: 'request-from', target: ALL_PEERS });
    await settle(a, c);

    expect(c.store.size).toBe(10);
    expect(c.events.filter((event) => event.type === 'decode-failed')).toEqual([]);
    expect(a.events).toContainEqual({ type: 'query-answered', to: 'peer-c', records: 10 });
    expect(a.channel.getPublished()).toHaveLength(2);
    expect(a.channel.getPublished().every((payload) => payload.byteLength <= 4096)).toBe(true);
  });

  it('should ignore a query addressed to another peer', async () => {
    const network = new MemoryGossipNetwork();
    const [a, x, y] = await start(network, 'peer-a', 'peer-x', 'peer-y');
    if (!a || !x || !y) throw new Error('nodes not started');

    await x.engine.execute({ type: 'create-record', fields: { name: 'Curry' } });
    await y.engine.execute({ type: 'create-record', fields: { name: 'Pie' } });

    await a.engine.execute({ type: 'request-from', target: peerTarget('peer-x') });
    await settle(a, x, y);

    expect(y.channel.getPublished()).toHaveLength(0);
    expect(y.events).toEqual([
      { type: 'query-ignored', from: 'peer-a', target: peerTarget('peer-x') },
      { type: 'announce-ignored', from: 'peer-x', target: peerTarget('peer-a') },
    ]);
    expect(y.store.listAll().map((r) => r.name)).toEqual(['Pie']);
    expect(a.store.listAll().map((r) => r.name)).toEqual(['Curry']);
    expect(x.channel.getPublished()).toHaveLength(1);
  });

  it('should not publish when asked to publish a record it does not own', async () => {
    const network = new MemoryGossipNetwork();
    const [a, b] = await start(network, 'peer-a', 'peer-b');
    if (!a || !b) throw new Error('nodes not started');

    await b.engine.execute({ type: 'create-record', fields: { name: 'Soup' } });
    await b.engine.execute({ type: 'publish-owned', selector: { kind: 'all' } });
    await settle(a, b);
    expect(a.store.get('peer-b', 1)?.name).toBe('Soup');

    const result = await a.engine.execute({ type: 'publish-owned', selector: { kind: 'one', id: 1 } });

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.name).toBe('NotFoundError');
    expect(a.channel.getPublished()).toHaveLength(0);
  });

  it('should keep replicating after a node restarts from its persisted state', async () => {
    const network = new MemoryGossipNetwork();
    const [a] = await start(network, 'peer-a');
    if (!a) throw new Error('node not started');
    await a.engine.execute({ type: 'create-record', fields: { name: 'Soup' } });
    await a.engine.shutdown();
    await a.channel.close();

    const restarted = await startTestNode(network, 'peer-a', { records: a.persistence.getSnapshot() });
    const [b] = await start(network, 'peer-b');
    nodes.push(restarted);
    if (!b) throw new Error('node not started');

    const created = await restarted.engine.execute({ type: 'create-record', fields: { name: 'Bread' } });
    expect(created.ok && created.kind === 'created' ? created.record.id : undefined).toBe(2);

    await b.engine.execute({ type: 'request-from', target: peerTarget('peer-a') });
    await settle(restarted, b);

    expect(sortByKey(b.store.listAll()).map((r) => r.name)).toEqual(['Soup', 'Bread']);
  });
});
