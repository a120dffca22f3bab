import type { Clock, FormattedRecord, LogLevel, TraceContext } from "@logbind/types";

/** Anything an activity can hand its start and end records to. */
export interface RecordEmitter {
  emit(record: FormattedRecord): void;
}

export const systemClock: Clock = () => performance.now();

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Formats an elapsed duration: `s.fff` under one minute, `m:ss.fff` from one minute on.
 *
 * @example
 * formatElapsed(500) => "0.500"
 * formatElapsed(61_500) => "1:01.500"
 */
export function formatElapsed(elapsedMs: number): string {
  const total = Math.max(0, Math.floor(elapsedMs));
  const millis = total % 1000;
  const totalSeconds = Math.floor(total / 1000);
  if (total < 60_000) return `${totalSeconds}.${pad(millis, 3)}`;

  const minutes = Math.floor(totalSeconds / 60);
  return `${minutes}:${pad(totalSeconds % 60, 2)}.${pad(millis, 3)}`;
}

/**
 * A timed activity. Emits `<name> [+]` when started and `<name> [<duration>]`
 * the first time it is closed; later closes do nothing.
 */
export class Activity {
  private readonly startedAt: number;
  private closed = false;

  private constructor(
    readonly name: string,
    readonly context: TraceContext,
    readonly level: LogLevel,
    private readonly emitter: RecordEmitter,
    private readonly clock: Clock,
  ) {
    this.startedAt = clock();
  }

  static start(
    name: string,
    context: TraceContext,
    level: LogLevel,
    emitter: RecordEmitter,
    clock: Clock = systemClock,
  ): Activity {
    const activity = new Activity(name, context, level, emitter, clock);
    emitter.emit({ message: `${name} [+]`, context, level });
    return activity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const elapsed = formatElapsed(this.clock() - this.startedAt);
    this.emitter.emit({ message: `${this.name} [${elapsed}]`, context: this.context, level: this.level });
  }

  dispose(): void {
    this.close();
  }

  /** Runs `fn` and closes the activity however `fn` exits. */
  run<T>(fn: (activity: Activity) => T): T {
    try {
      return fn(this);
    } finally {
      this.close();
    }
  }

  async runAsync<T>(fn: (activity: Activity) => Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      this.close();
    }
  }
}
