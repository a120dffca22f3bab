import type { Clock, FormattedRecord, SinkFactory, TraceSink } from "@logbind/types";
import type { RecordEmitter } from "../activity/activity";

/**
 * One owner's view of a compiled contract. The sink is resolved on the first
 * emission so that configuring the tracer after binding still applies.
 */
export class BoundTrace implements RecordEmitter {
  private sink: TraceSink | null = null;

  constructor(
    readonly ownerName: string,
    private readonly sinkFactory: SinkFactory,
    readonly clock: Clock,
  ) {}

  emit(record: FormattedRecord): void {
    if (record.level === "none") return;

    this.sink ??= this.sinkFactory(this.ownerName);
    this.sink.emit(this.ownerName, record.level, record.message, record.context, record.exception);
  }
}
