import { expect } from 'chai';
import { Redis } from 'ioredis';
import { BullScheduleAdapter } from '../../../src/server/scheduler/BullScheduleAdapter.js';
import { scheduleRefFor } from '../../../src/server/scheduler/ScheduleAdapter.js';
import { Clock, HOUR, ids } from '../helpers/fakes.js';
import type { TriggerQueue, TriggerRefs } from '../../../src/server/scheduler/BullScheduleAdapter.js';
import type { TriggerPayload } from '../../../src/server/scheduler/ScheduleAdapter.js';

const [ID] = ids;

class FakeQueue implements TriggerQueue {
  jobs = new Map<string, { data: TriggerPayload; delay: number }>();

  addFailures = 0;

  async add(_name: string, data: TriggerPayload, opts: { jobId: string; delay: number }): Promise<unknown> {
    if (this.addFailures > 0) {
      this.addFailures -= 1;
      throw new Error('queue unavailable');
    }
    this.jobs.set(opts.jobId, { data, delay: opts.delay });
    return opts.jobId;
  }

  async remove(jobId: string): Promise<number> {
    return this.jobs.delete(jobId) ? 1 : 0;
  }

  async close(): Promise<void> {}
}

function mapRefs(map: Map<string, string>): TriggerRefs {
  return {
    get: async (previewId) => map.get(previewId) ?? null,
    set: async (previewId, jobId) => { map.set(previewId, jobId); },
    delete: async (previewId) => { map.delete(previewId); },
  };
}

describe('BullScheduleAdapter', () => {
  let clock: Clock;
  let queue: FakeQueue;
  let refs: Map<string, string>;
  let connection: Redis;
  let adapter: BullScheduleAdapter;

  const first = new Date('2026-01-01T01:00:00.000Z');
  const second = new Date('2026-01-01T03:00:00.000Z');

  beforeEach(() => {
    clock = new Clock();
    queue = new FakeQueue();
    refs = new Map();
    // Never used for commands; the queue and refs are in memory
    connection = new Redis({ lazyConnect: true });
    adapter = new BullScheduleAdapter({
      queueName: 'lapse-test',
      connection,
      workerConnection: connection,
      keyPrefix: 'lapse:',
      now: clock.now,
      queue,
      refs: mapRefs(refs),
    });
  });

  afterEach(async () => {
    await adapter.close();
    connection.disconnect();
  });

  it('should add a delayed job for the expiry and record it as current', async () => {
    const ref = await adapter.arm(ID, first);

    expect(ref).to.equal(scheduleRefFor(ID, first));
    expect(queue.jobs.get(ref)).to.deep.equal({ data: { previewId: ID, expiresAt: '2026-01-01T01:00:00.000Z' }, delay: HOUR });
    expect(refs.get(ID)).to.equal(ref);
  });

  it('should replace the previous job on re-arm', async () => {
    const old = await adapter.arm(ID, first);
    const current = await adapter.arm(ID, second);

    expect(Array.from(queue.jobs.keys())).to.deep.equal([current]);
    expect(current).to.not.equal(old);
    expect(refs.get(ID)).to.equal(current);
  });

  it('should keep the previous job when adding the new one fails', async () => {
    const old = await adapter.arm(ID, first);
    queue.addFailures = 1;

    let error: unknown;
    try {
      await adapter.arm(ID, second);
    } catch (err) {
      error = err;
    }

    expect(error).to.be.instanceOf(Error);
    expect(Array.from(queue.jobs.keys())).to.deep.equal([old]);
    expect(refs.get(ID)).to.equal(old);
  });

  it('should remove the current job on disarm', async () => {
    await adapter.arm(ID, first);
    await adapter.disarm(ID);

    expect(queue.jobs.size).to.equal(0);
    expect(refs.has(ID)).to.equal(false);
  });
});
