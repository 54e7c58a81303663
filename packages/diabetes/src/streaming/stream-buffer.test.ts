import { describe, it, expect, vi, beforeEach } from "vitest";
import { StreamBuffer } from "./stream-buffer.js";
import { MemoryBatchWriter } from "./memory-writer.js";
import { ContractViolationError, ShortWriteError, StoreFailureError } from "./errors.js";
import { ONE_DAY_MS, ONE_HOUR_MS, ONE_MINUTE_MS } from "./window-policy.js";
import type { BatchWriteResult, BatchWriter } from "./types.js";

interface Reading {
  timestamp: number;
  value: number;
}

const MIDNIGHT = Date.UTC(2024, 0, 1);

function at(minutes: number, value = 100): Reading {
  return { timestamp: MIDNIGHT + minutes * ONE_MINUTE_MS, value };
}

/**
 * Writer that answers each batch from a script, then commits in full
 */
class ScriptedWriter implements BatchWriter<Reading> {
  readonly batches: Reading[][] = [];
  readonly committed: Reading[] = [];
  flushResult: BatchWriteResult<Reading> = { written: 0 };
  flushes = 0;

  constructor(private readonly script: Array<number | Error> = []) {}

  async writeBatch(records: readonly Reading[]): Promise<BatchWriteResult<Reading>> {
    this.batches.push(records.slice());
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    const written = next ?? records.length;
    this.committed.push(...records.slice(0, written));
    return { written };
  }

  async flush(): Promise<BatchWriteResult<Reading>> {
    this.flushes++;
    return this.flushResult;
  }
}

describe("StreamBuffer", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("windowing", () => {
    it("commits each hour on the grid as one batch", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      const result = await buffer.writeMany([at(0), at(30), at(60), at(90)]);

      expect(result).toEqual({ written: 4 });
      expect(store.batches).toEqual([[at(0), at(30)]]);
      expect(buffer.buffered()).toBe(2);

      const closed = await buffer.close();

      expect(closed).toEqual({ written: 2 });
      expect(store.batches).toEqual([
        [at(0), at(30)],
        [at(60), at(90)],
      ]);
      expect(store.flushes).toBe(1);
    });

    it("opens windows on grid boundaries, not on the first record", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(15), at(45), at(65)]);
      await buffer.close();

      expect(store.batches).toEqual([[at(15), at(45)], [at(65)]]);
    });

    it("opens windows on the first record with first-arrival anchoring", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS, anchoring: "first-arrival" });

      await buffer.writeMany([at(15), at(45), at(65)]);
      await buffer.close();

      expect(store.batches).toEqual([[at(15), at(45), at(65)]]);
    });

    it("starts a new window for a record exactly one duration after the anchor", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(59)]);
      await buffer.writeOne(at(60));

      expect(store.batches).toEqual([[at(0), at(59)]]);
      expect(buffer.buffered()).toBe(1);
    });

    it("skips empty windows across a gap", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(10), at(5 * 60 + 10)]);
      await buffer.close();

      expect(store.batches).toEqual([[at(10)], [at(5 * 60 + 10)]]);
    });

    it("keeps windowing across separate calls", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeOne(at(0));
      await buffer.writeOne(at(20));
      await buffer.writeMany([at(40), at(61)]);

      expect(store.batches).toEqual([[at(0), at(20), at(40)]]);
    });

    it("commits every accepted record exactly once, in order", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: 45 * ONE_MINUTE_MS });
      const readings = Array.from({ length: 60 }, (_, i) => at(i * 7, i));

      await buffer.writeMany(readings.slice(0, 25));
      await buffer.writeMany(readings.slice(25));
      await buffer.close();

      expect(store.records).toEqual(readings);
      expect(buffer.buffered()).toBe(0);
    });
  });

  describe("flush", () => {
    it("does not call the store when nothing is buffered", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      expect(await buffer.flush()).toEqual({ written: 0 });
      expect(store.batches).toHaveLength(0);
    });

    it("commits a partially filled window", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(10)]);

      expect(await buffer.flush()).toEqual({ written: 2 });
      expect(store.batches).toEqual([[at(0), at(10)]]);
      expect(buffer.buffered()).toBe(0);
    });

    it("opens a fresh window for the next record after a flush", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS, anchoring: "first-arrival" });

      await buffer.writeOne(at(0));
      await buffer.flush();
      await buffer.writeMany([at(50), at(100)]);

      expect(store.batches).toEqual([[at(0)]]);
      expect(buffer.buffered()).toBe(2);
    });
  });

  describe("failures", () => {
    it("keeps the uncommitted suffix after a short write", async () => {
      const store = new ScriptedWriter([1]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(10), at(20)]);
      const result = await buffer.flush();

      expect(result.written).toBe(1);
      expect(result.error).toBeInstanceOf(ShortWriteError);
      expect(result.error?.message).toBe("Short write: 1 of 3 records committed");
      expect(buffer.buffered()).toBe(2);
      expect(buffer.error).toBe(result.error);
    });

    it("reports the fault without calling the store until it is cleared", async () => {
      const store = new ScriptedWriter([1]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(10), at(20)]);
      const failed = await buffer.flush();

      expect(await buffer.flush()).toEqual({ written: 0, error: failed.error });
      expect(await buffer.writeOne(at(30))).toEqual({ written: 0, error: failed.error });
      expect(await buffer.close()).toEqual({ written: 0, error: failed.error });
      expect(store.batches).toHaveLength(1);

      buffer.clearFault();

      expect(await buffer.flush()).toEqual({ written: 2 });
      expect(store.batches[1]).toEqual([at(10), at(20)]);
      expect(store.committed).toEqual([at(0), at(10), at(20)]);
      expect(buffer.error).toBeNull();
    });

    it("stops at a failed boundary commit and takes the rest on resubmission", async () => {
      const store = new ScriptedWriter([1]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });
      const readings = [at(0), at(30), at(60), at(90)];

      const result = await buffer.writeMany(readings);

      expect(result.written).toBe(2);
      expect(result.error).toBeInstanceOf(ShortWriteError);
      expect(buffer.buffered()).toBe(1);

      buffer.clearFault();
      expect(await buffer.writeMany(readings.slice(result.written))).toEqual({ written: 2 });
      await buffer.close();

      expect(store.batches).toEqual([[at(0), at(30)], [at(30)], [at(60), at(90)]]);
      expect(store.committed).toEqual(readings);
    });

    it("passes a store failure through unchanged and keeps every record", async () => {
      const failure = new StoreFailureError("throttled");
      const store = new ScriptedWriter([failure]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(10)]);
      const result = await buffer.flush();

      expect(result).toEqual({ written: 0, error: failure });
      expect(result.error).toBe(failure);
      expect(buffer.buffered()).toBe(2);

      buffer.clearFault();
      await buffer.close();

      expect(store.committed).toEqual([at(0), at(10)]);
    });

    it("logs the failed flush", async () => {
      const store = new ScriptedWriter([new Error("timeout")]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS, name: "cgm" });

      await buffer.writeOne(at(0));
      await buffer.flush();

      expect(console.error).toHaveBeenCalledWith(
        "[cgm] Flush committed 0 of 1 records, 1 retained:",
        "timeout"
      );
    });
  });

  describe("input contract", () => {
    it("rejects an empty batch", async () => {
      const buffer = new StreamBuffer(new MemoryBatchWriter<Reading>(), { durationMs: ONE_HOUR_MS });

      const result = await buffer.writeMany([]);

      expect(result.written).toBe(0);
      expect(result.error).toBeInstanceOf(ContractViolationError);
    });

    it("rejects an unordered batch without taking any of it", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      const result = await buffer.writeMany([at(0), at(90), at(30)]);

      expect(result.written).toBe(0);
      expect(result.error).toBeInstanceOf(ContractViolationError);
      expect(buffer.buffered()).toBe(0);
      expect(store.batches).toHaveLength(0);
    });

    it("rejects a record older than one already accepted, without faulting", async () => {
      const buffer = new StreamBuffer(new MemoryBatchWriter<Reading>(), { durationMs: ONE_HOUR_MS });

      await buffer.writeOne(at(30));
      const result = await buffer.writeOne(at(10));

      expect(result.error).toBeInstanceOf(ContractViolationError);
      expect(buffer.error).toBeNull();
      expect(await buffer.writeOne(at(30))).toEqual({ written: 1 });
      expect(buffer.buffered()).toBe(2);
    });

    it("rejects writes after close", async () => {
      const buffer = new StreamBuffer(new MemoryBatchWriter<Reading>(), {
        durationMs: ONE_HOUR_MS,
        name: "cgm",
      });

      await buffer.close();
      const result = await buffer.writeOne(at(0));

      expect(result.error).toBeInstanceOf(ContractViolationError);
      expect(result.error?.message).toBe("cgm buffer is closed");
    });

    it("refuses a window that is not a positive duration", () => {
      const store = new MemoryBatchWriter<Reading>();

      expect(() => new StreamBuffer(store, { durationMs: 0 })).toThrow(ContractViolationError);
    });
  });

  describe("close", () => {
    it("flushes the writer behind it even when nothing is buffered", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      expect(await buffer.close()).toEqual({ written: 0 });
      expect(store.batches).toHaveLength(0);
      expect(store.flushes).toBe(1);
    });

    it("does nothing the second time", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeOne(at(0));
      await buffer.close();

      expect(await buffer.close()).toEqual({ written: 0 });
      expect(store.batches).toHaveLength(1);
      expect(store.flushes).toBe(1);
    });

    it("does not close when the local flush fails", async () => {
      const store = new ScriptedWriter([new Error("timeout")]);
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeOne(at(0));
      const result = await buffer.close();

      expect(result.error?.message).toBe("timeout");
      expect(store.flushes).toBe(0);

      buffer.clearFault();
      expect(await buffer.close()).toEqual({ written: 1 });
      expect(store.flushes).toBe(1);
    });

    it("retries only the downstream flush after it fails", async () => {
      const failure = new StoreFailureError("downstream unavailable");
      const store = new ScriptedWriter();
      store.flushResult = { written: 0, error: failure };
      const buffer = new StreamBuffer(store, { durationMs: ONE_HOUR_MS });

      await buffer.writeMany([at(0), at(10)]);
      const result = await buffer.close();

      expect(result).toEqual({ written: 2, error: failure });
      expect(buffer.error).toBeNull();
      expect(buffer.buffered()).toBe(0);

      store.flushResult = { written: 0 };
      expect(await buffer.close()).toEqual({ written: 0 });
      expect(store.batches).toHaveLength(1);
      expect(store.flushes).toBe(2);
    });
  });

  describe("chaining", () => {
    it("cascades a close through every buffer down to the store", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const daily = new StreamBuffer(store, { durationMs: ONE_DAY_MS });
      const hourly = new StreamBuffer(daily, { durationMs: ONE_HOUR_MS });

      await hourly.writeMany([at(0), at(30), at(60), at(90)]);

      expect(store.batches).toHaveLength(0);
      expect(daily.buffered()).toBe(2);

      await hourly.close();

      expect(store.batches).toEqual([[at(0), at(30), at(60), at(90)]]);
      expect(store.flushes).toBe(1);
      expect(hourly.buffered()).toBe(0);
      expect(daily.buffered()).toBe(0);
    });

    it("drains every layer of a deeper chain on one close", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const daily = new StreamBuffer(store, { durationMs: ONE_DAY_MS });
      const middle = new StreamBuffer(daily, { durationMs: ONE_HOUR_MS });
      const top = new StreamBuffer(middle, { durationMs: ONE_HOUR_MS });

      await top.writeMany([at(0), at(30), at(60), at(90)]);
      const closed = await top.close();

      expect(closed).toEqual({ written: 2 });
      expect(store.batches).toEqual([[at(0), at(30), at(60), at(90)]]);
      expect(store.flushes).toBe(1);
      expect(middle.buffered()).toBe(0);
      expect(daily.buffered()).toBe(0);
    });

    it("drains the chain without closing the buffer", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const daily = new StreamBuffer(store, { durationMs: ONE_DAY_MS });
      const hourly = new StreamBuffer(daily, { durationMs: ONE_HOUR_MS });

      await hourly.writeMany([at(0), at(10)]);

      expect(await hourly.drain()).toEqual({ written: 2 });
      expect(store.records).toEqual([at(0), at(10)]);
      expect(await hourly.writeOne(at(20))).toEqual({ written: 1 });
    });

    it("groups hourly batches into daily ones", async () => {
      const store = new MemoryBatchWriter<Reading>();
      const daily = new StreamBuffer(store, { durationMs: ONE_DAY_MS });
      const hourly = new StreamBuffer(daily, { durationMs: ONE_HOUR_MS });

      await hourly.writeMany([at(0), at(23 * 60), at(24 * 60 + 5), at(26 * 60)]);
      await hourly.close();

      expect(store.batches).toEqual([
        [at(0), at(23 * 60)],
        [at(24 * 60 + 5), at(26 * 60)],
      ]);
    });
  });
});
