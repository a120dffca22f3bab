import createDebug from "debug";
import type { Clock, ContractSpec, SinkFactory } from "@logbind/types";
import { systemClock } from "../activity/activity";
import { ContractRegistry } from "../contract/registry";
import { isContract, type Contract, type TraceOf, type UntypedTrace } from "../contract/define";
import { debugSinkFactory, noopSinkFactory } from "./sinks";

const debug = createDebug("logbind:core:tracer");

/** A logical owner: its name, or any named function or class. */
export type TraceOwner = string | { readonly name: string };

export type TracerOptions = {
  registry?: ContractRegistry;
  clock?: Clock;
};

function ownerNameOf(owner: TraceOwner): string {
  const name = typeof owner === "string" ? owner : owner.name;
  if (!name) throw new TypeError("A trace owner must have a non-empty name");
  return name;
}

/**
 * Binds contracts to owners and decides where their records go.
 * The sink factory is read when a bound implementation first emits,
 * not when it is bound.
 */
export class Tracer {
  private readonly registry: ContractRegistry;
  private readonly clock: Clock;
  private sinkFactory: SinkFactory | null = null;

  constructor(options: TracerOptions = {}) {
    this.registry = options.registry ?? new ContractRegistry();
    this.clock = options.clock ?? systemClock;
  }

  /** Routes every owner's records to the sinks `factory` creates. */
  init(factory: SinkFactory): void {
    debug("init: custom sink factory");
    this.sinkFactory = factory;
  }

  /** Drops every record. */
  disable(): void {
    debug("disable: records will be dropped");
    this.sinkFactory = noopSinkFactory;
  }

  /** Restores the `debug` fallback sink. */
  reset(): void {
    this.sinkFactory = null;
  }

  get contracts(): ContractRegistry {
    return this.registry;
  }

  bind<C extends Contract>(contract: C, owner: TraceOwner): TraceOf<C>;
  bind(contract: ContractSpec, owner: TraceOwner): UntypedTrace;
  bind(contract: Contract | ContractSpec, owner: TraceOwner): unknown {
    const lazyFactory: SinkFactory = (ownerName) => (this.sinkFactory ?? debugSinkFactory)(ownerName);
    if (isContract(contract)) {
      return this.registry.getOrCompile(contract, ownerNameOf(owner), lazyFactory, this.clock);
    }
    return this.registry.getOrCompile(contract, ownerNameOf(owner), lazyFactory, this.clock);
  }
}

/** The process-wide tracer. */
export const tracer = new Tracer();
