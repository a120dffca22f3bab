import createDebug from "debug";
import type { Clock, ContractSpec, SinkFactory } from "@logbind/types";
import { systemClock } from "../activity/activity";
import { BoundTrace } from "../tracer/bound-trace";
import { compileContract, type CompiledContract } from "./compile";
import { toContractSpec, type Contract, type TraceOf, type UntypedTrace } from "./define";

const debug = createDebug("logbind:core:registry");

export type ContractCompiler = (spec: ContractSpec) => CompiledContract;

/**
 * Caches one compiled dispatch table per contract for the life of the process.
 *
 * Compilation is synchronous, so within one JavaScript thread the lookup and the
 * insert below run as a single critical section: concurrent first uses all observe
 * the same compiled contract. Entries are never evicted.
 */
export class ContractRegistry {
  private compiled = new Map<ContractSpec, CompiledContract>();

  constructor(private readonly compiler: ContractCompiler = compileContract) {}

  get size(): number {
    return this.compiled.size;
  }

  has(contract: Contract | ContractSpec): boolean {
    return this.compiled.has(toContractSpec(contract));
  }

  compile(contract: Contract | ContractSpec): CompiledContract {
    const spec = toContractSpec(contract);
    const cached = this.compiled.get(spec);
    if (cached) {
      debug("compile %s → cached", spec.name);
      return cached;
    }

    debug("compile %s → compiling", spec.name);
    // A throwing compiler leaves nothing behind in the cache.
    const compiled = this.compiler(spec);
    this.compiled.set(spec, compiled);
    return compiled;
  }

  getOrCompile<C extends Contract>(
    contract: C,
    ownerName: string,
    sinkFactory: SinkFactory,
    clock?: Clock,
  ): TraceOf<C>;
  getOrCompile(
    contract: ContractSpec,
    ownerName: string,
    sinkFactory: SinkFactory,
    clock?: Clock,
  ): UntypedTrace;
  getOrCompile(
    contract: Contract | ContractSpec,
    ownerName: string,
    sinkFactory: SinkFactory,
    clock: Clock = systemClock,
  ): unknown {
    const compiled = this.compile(contract);
    debug("bind %s to owner %s", compiled.name, ownerName);
    return compiled.instantiate(new BoundTrace(ownerName, sinkFactory, clock));
  }
}
