import { ReadWriteLock } from "../../src/utils/rwlock";

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe("ReadWriteLock", () => {
  test("readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const a = await lock.acquireRead();
    const b = await lock.acquireRead();

    expect(lock.readers).toBe(2);
    a();
    b();
    expect(lock.readers).toBe(0);
  });

  test("a writer waits for active readers", async () => {
    const lock = new ReadWriteLock();
    const release = await lock.acquireRead();
    let writing = false;
    const writer = lock.acquireWrite().then(done => {
      writing = true;
      return done;
    });

    await tick();
    expect(writing).toBe(false);
    expect(lock.pending).toBe(1);

    release();
    const releaseWrite = await writer;
    expect(lock.writing).toBe(true);
    releaseWrite();
    expect(lock.writing).toBe(false);
  });

  test("readers arriving after a queued writer wait behind it", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const firstRead = await lock.acquireRead();

    const writer = lock.withWrite(async () => {
      order.push("write");
    });
    const lateReader = lock.withRead(() => {
      order.push("read");
    });

    await tick();
    expect(order).toEqual([]);

    firstRead();
    await Promise.all([writer, lateReader]);
    expect(order).toEqual(["write", "read"]);
  });

  test("writers are exclusive", async () => {
    const lock = new ReadWriteLock();
    let active = 0;
    let maxActive = 0;
    const job = () =>
      lock.withWrite(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await tick();
        active--;
      });

    await Promise.all([job(), job(), job()]);

    expect(maxActive).toBe(1);
  });

  test("releases the lock when the callback throws", async () => {
    const lock = new ReadWriteLock();

    await expect(lock.withWrite(() => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(lock.writing).toBe(false);
    await expect(lock.withRead(() => "ok")).resolves.toBe("ok");
  });

  test("calling a release twice has no further effect", async () => {
    const lock = new ReadWriteLock();
    const first = await lock.acquireRead();
    const second = await lock.acquireRead();

    first();
    first();

    expect(lock.readers).toBe(1);
    second();
    expect(lock.readers).toBe(0);
  });
});
