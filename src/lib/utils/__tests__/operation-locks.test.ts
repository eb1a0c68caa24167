import { describe, it, expect } from '@jest/globals';
import { KeyedMutex, OperationLocks, ReadWriteGate } from '../operation-locks';

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('k', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('k', async () => {
      order.push('second');
    });

    await flush();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('k')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const a = mutex.runExclusive('a', async () => {
      order.push('a:start');
      await gate.promise;
      order.push('a:end');
    });
    const b = mutex.runExclusive('b', async () => {
      order.push('b');
    });

    await b;
    expect(order).toEqual(['a:start', 'b']);
    gate.resolve();
    await a;
    expect(order).toEqual(['a:start', 'b', 'a:end']);
  });

  it('keeps the queue moving after a task fails', async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.runExclusive('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('k', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('ReadWriteGate', () => {
  it('holds an exclusive task until shared tasks drain', async () => {
    const gate = new ReadWriteGate();
    const order: string[] = [];
    const reader = deferred();

    const shared = gate.shared(async () => {
      order.push('shared:start');
      await reader.promise;
      order.push('shared:end');
    });
    await flush();
    expect(gate.activeReaders).toBe(1);

    const exclusive = gate.exclusive(async () => {
      order.push('exclusive');
    });
    await flush();
    expect(order).toEqual(['shared:start']);

    reader.resolve();
    await Promise.all([shared, exclusive]);
    expect(order).toEqual(['shared:start', 'shared:end', 'exclusive']);
    expect(gate.activeReaders).toBe(0);
  });

  it('holds shared tasks while an exclusive task runs', async () => {
    const gate = new ReadWriteGate();
    const order: string[] = [];
    const writer = deferred();

    const exclusive = gate.exclusive(async () => {
      order.push('exclusive:start');
      await writer.promise;
      order.push('exclusive:end');
    });
    const shared = gate.shared(async () => {
      order.push('shared');
    });

    await flush();
    expect(order).toEqual(['exclusive:start']);

    writer.resolve();
    await Promise.all([exclusive, shared]);
    expect(order).toEqual(['exclusive:start', 'exclusive:end', 'shared']);
  });
});

describe('OperationLocks', () => {
  it('serializes per user while other users proceed', async () => {
    const locks = new OperationLocks();
    const order: string[] = [];
    const gate = deferred();

    const aliceFirst = locks.forUser('alice', async () => {
      order.push('alice:1:start');
      await gate.promise;
      order.push('alice:1:end');
    });
    const aliceSecond = locks.forUser('alice', async () => {
      order.push('alice:2');
    });
    const bob = locks.forUser('bob', async () => {
      order.push('bob');
    });

    await bob;
    expect(order).toEqual(['alice:1:start', 'bob']);
    gate.resolve();
    await Promise.all([aliceFirst, aliceSecond]);
    expect(order).toEqual(['alice:1:start', 'bob', 'alice:1:end', 'alice:2']);
  });

  it('keeps user and pool work out of a maintenance pass', async () => {
    const locks = new OperationLocks();
    const order: string[] = [];
    const gate = deferred();

    const maintenance = locks.forMaintenance(async () => {
      order.push('maintenance:start');
      await gate.promise;
      order.push('maintenance:end');
    });
    const user = locks.forUser('alice', async () => {
      order.push('user');
    });
    const pool = locks.forPool(async () => {
      order.push('pool');
    });

    await flush();
    expect(order).toEqual(['maintenance:start']);
    gate.resolve();
    await Promise.all([maintenance, user, pool]);
    expect(order).toEqual(['maintenance:start', 'maintenance:end', 'user', 'pool']);
  });
});
