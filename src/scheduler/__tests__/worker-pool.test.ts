/**
 * WorkerPool Unit Tests
 */

import { expect } from 'chai';
import { deferred } from '../../__tests__/fakes';
import { PoolFullError, WorkerPool } from '../worker-pool';

describe('WorkerPool', () => {
  it('should refuse a task when every slot is busy', () => {
    const pool = new WorkerPool(2, () => undefined);
    const gate = deferred<void>();

    pool.start(() => gate.promise);
    pool.start(() => gate.promise);

    expect(pool.active).to.equal(2);
    expect(pool.freeSlots).to.equal(0);
    expect(() => pool.start(() => gate.promise)).to.throw(PoolFullError);
    gate.resolve();
    return pool.drain();
  });

  it('should free a slot as soon as its task settles', async () => {
    const pool = new WorkerPool(2, () => undefined);
    const first = deferred<void>();
    const second = deferred<void>();
    pool.start(() => first.promise);
    pool.start(() => second.promise);

    first.resolve();
    await pool.whenAnySettles();

    expect(pool.active).to.equal(1);
    expect(pool.freeSlots).to.equal(1);
    expect(pool.peakActive).to.equal(2);
    second.resolve();
    await pool.drain();
    expect(pool.active).to.equal(0);
  });

  it('should hand rejections to onError and keep the slot count right', async () => {
    const errors: unknown[] = [];
    const pool = new WorkerPool(1, (error) => errors.push(error));

    pool.start(async () => {
      throw new Error('task blew up');
    });
    await pool.drain();

    expect(errors).to.have.lengthOf(1);
    expect(errors[0]).to.have.property('message', 'task blew up');
    expect(pool.freeSlots).to.equal(1);
  });

  it('should resolve whenAnySettles immediately when idle', async () => {
    await new WorkerPool(1, () => undefined).whenAnySettles();
  });

  it('should reject a capacity below one', () => {
    expect(() => new WorkerPool(0, () => undefined)).to.throw('positive integer');
  });
});
