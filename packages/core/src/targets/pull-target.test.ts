/**
 * Pull Target Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DEFAULT_RELABEL_RULE, PULL_TARGET_STATES, type Entry } from '@logbridge/shared';
import type { EntrySink } from '../sink/index.js';
import type { TargetMetrics } from '../metrics/index.js';
import { HandoffCancelledError } from './handoff.js';
import { PullTarget } from './pull-target.js';
import type { DeliverFn, PullTargetConfig, ReceivedMessage, SubscriptionClient } from './types.js';

class FakeSubscriptionClient implements SubscriptionClient {
  private deliverFn: DeliverFn | null = null;
  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null;
  readonly close = vi.fn(async () => undefined);

  receive(signal: AbortSignal, deliver: DeliverFn): Promise<void> {
    this.deliverFn = deliver;
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  deliver(message: ReceivedMessage): Promise<void> {
    if (!this.deliverFn) {
      return Promise.reject(new Error('receive() was not called'));
    }
    return this.deliverFn(message);
  }

  fail(error: Error): void {
    this.settle?.reject(error);
  }
}

function message(id: string, data: Uint8Array = Buffer.from('hello')) {
  return {
    id,
    data,
    attributes: {},
    publishTime: new Date('2024-01-01T00:00:00Z'),
    ack: vi.fn(),
    nack: vi.fn(),
  };
}

function gate(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

function recordingSink(hold?: Promise<void>) {
  const entries: Entry[] = [];
  const submit = vi.fn(async (entry: Entry) => {
    if (hold) await hold;
    entries.push(entry);
  });
  const stop = vi.fn();
  const sink: EntrySink = { submit, stop };
  return { sink, entries, submit, stop };
}

function fakeMetrics() {
  const entryAccepted = vi.fn();
  const entryFailed = vi.fn();
  const subscriptionFailed = vi.fn();
  const metrics: TargetMetrics = { entryAccepted, entryFailed, subscriptionFailed };
  return { metrics, entryAccepted, entryFailed, subscriptionFailed };
}

const CONFIG: PullTargetConfig = {
  subscriptionType: 'pull',
  jobName: 'gcp',
  projectId: 'test-project',
  subscription: 'test-sub',
  labels: { job: 'gcp' },
  useIncomingTimestamp: true,
  relabelRules: [],
  maxOutstandingMessages: 10,
};

describe('PullTarget', () => {
  let client: FakeSubscriptionClient;
  let targets: PullTarget[];

  function createTarget(sink: EntrySink, metrics: TargetMetrics, config: PullTargetConfig = CONFIG): PullTarget {
    const target = new PullTarget(config, client, { sink, metrics });
    targets.push(target);
    return target;
  }

  beforeEach(() => {
    client = new FakeSubscriptionClient();
    targets = [];
  });

  afterEach(async () => {
    await Promise.all(targets.map((target) => target.stop()));
  });

  it('should be running right after construction', () => {
    const { sink } = recordingSink();
    const target = createTarget(sink, fakeMetrics().metrics);

    expect(target.getState()).toBe(PULL_TARGET_STATES.RUNNING);
  });

  it('should expose the target facade', () => {
    const { sink } = recordingSink();
    const target = createTarget(sink, fakeMetrics().metrics);

    expect(target.type()).toBe('gcplog');
    expect(target.labels()).toEqual({ job: 'gcp' });
    expect(target.discoveredLabels()).toEqual({});
    expect(target.ready()).toBe(true);
    expect(target.details()).toEqual({ project_id: 'test-project', subscription: 'test-sub', state: 'RUNNING' });
  });

  it('should submit the entry and then ack the message', async () => {
    const { sink, entries, submit } = recordingSink();
    const { metrics, entryAccepted } = fakeMetrics();
    createTarget(sink, metrics);
    const received = message('m-1');

    await client.deliver(received);
    await vi.waitFor(() => expect(received.ack).toHaveBeenCalledTimes(1));

    expect(entries).toEqual([{ labels: { job: 'gcp' }, timestamp: new Date('2024-01-01T00:00:00Z'), line: 'hello' }]);
    expect(submit.mock.invocationCallOrder[0]).toBeLessThan(received.ack.mock.invocationCallOrder[0] ?? 0);
    expect(received.nack).not.toHaveBeenCalled();
    expect(entryAccepted).toHaveBeenCalledTimes(1);
  });

  it('should not ack before the sink accepts the entry', async () => {
    const hold = gate();
    const { sink, submit } = recordingSink(hold.promise);
    createTarget(sink, fakeMetrics().metrics);
    const received = message('m-1');

    await client.deliver(received);
    await vi.waitFor(() => expect(submit).toHaveBeenCalledTimes(1));
    expect(received.ack).not.toHaveBeenCalled();

    hold.release();
    await vi.waitFor(() => expect(received.ack).toHaveBeenCalledTimes(1));
  });

  it('should ack untranslatable messages without submitting them', async () => {
    const { sink, submit } = recordingSink();
    const { metrics, entryFailed } = fakeMetrics();
    const target = createTarget(sink, metrics);
    const failed = vi.fn();
    target.on('entry:failed', failed);
    const received = message('m-bad', Buffer.from([0xff]));

    await client.deliver(received);
    await vi.waitFor(() => expect(received.ack).toHaveBeenCalledTimes(1));

    expect(submit).not.toHaveBeenCalled();
    expect(entryFailed).toHaveBeenCalledWith('malformed');
    expect(failed).toHaveBeenCalledWith({ messageId: 'm-bad', reason: 'malformed' });
  });

  it('should nack a message the sink rejects', async () => {
    const submit = vi.fn(async () => {
      throw new Error('sink stopped');
    });
    const sink: EntrySink = { submit, stop: vi.fn() };
    const { metrics, entryFailed, entryAccepted } = fakeMetrics();
    createTarget(sink, metrics);
    const received = message('m-1');

    await client.deliver(received);
    await vi.waitFor(() => expect(received.nack).toHaveBeenCalledTimes(1));

    expect(received.ack).not.toHaveBeenCalled();
    expect(entryFailed).toHaveBeenCalledWith('sink');
    expect(entryAccepted).not.toHaveBeenCalled();
  });

  it('should keep consuming after handling a message throws', async () => {
    const { sink, submit } = recordingSink();
    const { metrics, entryFailed } = fakeMetrics();
    const target = createTarget(sink, metrics, {
      ...CONFIG,
      relabelRules: [{ ...DEFAULT_RELABEL_RULE, action: 'keep', sourceLabels: ['job'], regex: '(' }],
    });
    const first = message('m-1');
    const second = message('m-2');

    await client.deliver(first);
    await vi.waitFor(() => expect(first.ack).toHaveBeenCalledTimes(1));
    await client.deliver(second);
    await vi.waitFor(() => expect(second.ack).toHaveBeenCalledTimes(1));

    expect(submit).not.toHaveBeenCalled();
    expect(entryFailed.mock.calls).toEqual([['malformed'], ['malformed']]);
    expect(target.getState()).toBe(PULL_TARGET_STATES.RUNNING);
  });

  it('should settle a message once when a listener throws', async () => {
    const { sink } = recordingSink();
    const { metrics, entryAccepted, entryFailed } = fakeMetrics();
    const target = createTarget(sink, metrics);
    target.on('entry:submitted', () => {
      throw new Error('listener failed');
    });
    const first = message('m-1');
    const second = message('m-2');

    await client.deliver(first);
    await vi.waitFor(() => expect(first.ack).toHaveBeenCalledTimes(1));
    await client.deliver(second);
    await vi.waitFor(() => expect(second.ack).toHaveBeenCalledTimes(1));

    expect(first.nack).not.toHaveBeenCalled();
    expect(entryAccepted).toHaveBeenCalledTimes(2);
    expect(entryFailed).not.toHaveBeenCalled();
  });

  it('should hold back delivery while the consumer is busy', async () => {
    const hold = gate();
    const { sink, entries, submit } = recordingSink(hold.promise);
    createTarget(sink, fakeMetrics().metrics);
    const first = message('m-1');
    const second = message('m-2', Buffer.from('world'));

    await client.deliver(first);
    await vi.waitFor(() => expect(submit).toHaveBeenCalledTimes(1));

    let handedOver = false;
    const secondDelivery = client.deliver(second).then(() => {
      handedOver = true;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(handedOver).toBe(false);

    hold.release();
    await secondDelivery;
    await vi.waitFor(() => expect(second.ack).toHaveBeenCalledTimes(1));

    expect(entries.map((entry) => entry.line)).toEqual(['hello', 'world']);
    expect(first.ack).toHaveBeenCalledTimes(1);
  });

  it('should reject handles still waiting when the target stops', async () => {
    const hold = gate();
    const { sink } = recordingSink(hold.promise);
    const target = createTarget(sink, fakeMetrics().metrics);
    const first = message('m-1');
    const second = message('m-2');

    await client.deliver(first);
    const rejected = expect(client.deliver(second)).rejects.toBeInstanceOf(HandoffCancelledError);

    const stopped = target.stop();
    await rejected;
    hold.release();
    await stopped;

    expect(first.ack).toHaveBeenCalledTimes(1);
    expect(second.ack).not.toHaveBeenCalled();
    expect(target.getState()).toBe(PULL_TARGET_STATES.STOPPED);
  });

  it('should stop once however often stop is called', async () => {
    const { sink, stop } = recordingSink();
    const target = createTarget(sink, fakeMetrics().metrics);

    const first = target.stop();
    const second = target.stop();
    expect(second).toBe(first);
    await first;
    await target.stop();
    await target.receiveEnded();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(client.close).toHaveBeenCalledTimes(1);
    expect(target.getState()).toBe(PULL_TARGET_STATES.STOPPED);
  });

  it('should emit state changes while stopping', async () => {
    const { sink } = recordingSink();
    const target = createTarget(sink, fakeMetrics().metrics);
    const changes: string[] = [];
    target.on('state:changed', ({ from, to }) => changes.push(`${from}->${to}`));

    await target.stop();

    expect(changes).toEqual(['RUNNING->CANCELLING', 'CANCELLING->STOPPED']);
  });

  it('should record a subscription failure and cancel', async () => {
    const { sink, stop } = recordingSink();
    const { metrics, subscriptionFailed } = fakeMetrics();
    const target = createTarget(sink, metrics);

    client.fail(new Error('subscription revoked'));
    await target.receiveEnded();

    expect(subscriptionFailed).toHaveBeenCalledTimes(1);
    expect(target.getState()).toBe(PULL_TARGET_STATES.CANCELLING);
    expect(stop).not.toHaveBeenCalled();
    expect(client.close).toHaveBeenCalledTimes(1);

    await target.stop();
    expect(target.getState()).toBe(PULL_TARGET_STATES.STOPPED);
    expect(stop).toHaveBeenCalledTimes(1);
  });
});
