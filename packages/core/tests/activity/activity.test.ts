import { describe, it, expect } from "vitest";
import type { FormattedRecord } from "@logbind/types";
import { Activity, formatElapsed, type RecordEmitter } from "../../src/activity/activity";
import { ManualClock } from "../../src/testing/recording-sink";

class Recorder implements RecordEmitter {
  readonly records: FormattedRecord[] = [];

  emit(record: FormattedRecord): void {
    this.records.push(record);
  }
}

describe("formatElapsed", () => {
  it("should format durations under a minute as seconds", () => {
    expect(formatElapsed(0)).toBe("0.000");
    expect(formatElapsed(500)).toBe("0.500");
    expect(formatElapsed(1234.9)).toBe("1.234");
    expect(formatElapsed(59_999)).toBe("59.999");
  });

  it("should format a minute or more as minutes and seconds", () => {
    expect(formatElapsed(60_000)).toBe("1:00.000");
    expect(formatElapsed(61_500)).toBe("1:01.500");
    expect(formatElapsed(3_661_000)).toBe("61:01.000");
  });

  it("should clamp negative durations to zero", () => {
    expect(formatElapsed(-5)).toBe("0.000");
  });
});

describe("Activity", () => {
  function start(recorder: Recorder, clock: ManualClock): Activity {
    return Activity.start("Import orders", { source: "s3" }, "info", recorder, clock.read);
  }

  it("should emit a start record immediately", () => {
    const recorder = new Recorder();
    const activity = start(recorder, new ManualClock());

    expect(recorder.records).toEqual([
      { message: "Import orders [+]", context: { source: "s3" }, level: "info" },
    ]);
    expect(activity.isClosed).toBe(false);
    expect(activity.name).toBe("Import orders");
  });

  it("should emit the elapsed time when closed", () => {
    const recorder = new Recorder();
    const clock = new ManualClock();
    const activity = start(recorder, clock);

    clock.advance(1_500);
    activity.close();

    expect(recorder.records[1]).toEqual({
      message: "Import orders [1.500]",
      context: { source: "s3" },
      level: "info",
    });
    expect(activity.isClosed).toBe(true);
  });

  it("should emit a single end record when closed twice", () => {
    const recorder = new Recorder();
    const clock = new ManualClock();
    const activity = start(recorder, clock);

    clock.advance(500);
    activity.close();
    clock.advance(500);
    activity.dispose();

    expect(recorder.records.map((r) => r.message)).toEqual([
      "Import orders [+]",
      "Import orders [0.500]",
    ]);
  });

  it("should close after run returns", () => {
    const recorder = new Recorder();
    const clock = new ManualClock();
    const activity = start(recorder, clock);

    const result = activity.run(() => {
      clock.advance(61_500);
      return 7;
    });

    expect(result).toBe(7);
    expect(recorder.records[1]?.message).toBe("Import orders [1:01.500]");
  });

  it("should close when run throws", () => {
    const recorder = new Recorder();
    const activity = start(recorder, new ManualClock());

    expect(() =>
      activity.run(() => {
        throw new Error("import failed");
      }),
    ).toThrow("import failed");
    expect(activity.isClosed).toBe(true);
    expect(recorder.records).toHaveLength(2);
  });

  it("should close after an async body settles", async () => {
    const recorder = new Recorder();
    const clock = new ManualClock();
    const activity = start(recorder, clock);

    await expect(
      activity.runAsync(async () => {
        clock.advance(250);
        throw new Error("timeout");
      }),
    ).rejects.toThrow("timeout");

    expect(recorder.records[1]?.message).toBe("Import orders [0.250]");
  });

  it("should close once when run and an explicit close overlap", () => {
    const recorder = new Recorder();
    const activity = start(recorder, new ManualClock());

    activity.run((a) => a.close());

    expect(recorder.records).toHaveLength(2);
  });
});
