// src/builder.ts
// Registers blocks and their wiring, validates it, and builds a Simulation

import type { Block } from './block.js';
import {
  BuilderStateError,
  CycleDetectedError,
  DuplicateBlockNameError,
  InvalidDelayError,
  MultipleProducersError,
  ParameterError,
  SignalTypeError,
  UnconnectedPortsError,
  UnknownPortError,
  UnknownSignalError,
} from './errors.js';
import { DiGraph, toDot } from './graph.js';
import type { ParameterStore } from './parameters.js';
import type { InputPort } from './ports.js';
import type { AnySignal } from './signal.js';
import { Simulation } from './simulation.js';
import {
  SimulationParametersSchema,
  type BuildOptions,
  type PortConnections,
  type SimulationParametersInput,
} from './types.js';
import { hasOwn } from './utils.js';

// ============ Types ============

interface BlockData {
  block: Block;
  delay: number;
  /** input port -> signal */
  inputs: Map<string, string>;
  /** output port -> signal */
  outputs: Map<string, string>;
}

enum BuilderState {
  OPEN = 'open',
  BUILT = 'built',
}

// ============ Builder ============

/**
 * Accumulates blocks and their port-to-signal wiring. `build` orders the
 * blocks, binds inputs and hands them to a `Simulation`.
 *
 * A rejected `addBlock` or `build` leaves the builder as it was.
 */
export class SimulationBuilder {
  private readonly blocks = new Map<string, BlockData>();
  private readonly signals = new Map<string, AnySignal>();
  private readonly producers = new Map<string, string>();
  private state = BuilderState.OPEN;

  get blockNames(): string[] {
    return [...this.blocks.keys()];
  }

  get signalNames(): string[] {
    return [...this.signals.keys()];
  }

  hasBlock(name: string): boolean {
    return this.blocks.has(name);
  }

  /** Name of the block producing `signal`, if any. */
  producerOf(signal: string): string | undefined {
    return this.producers.get(signal);
  }

  /**
   * Register a block with its wiring. Every declared port must be listed
   * exactly once; inputs are bound later, in `build`, since a consumer may be
   * registered before its producer.
   */
  addBlock(block: Block, inputs: PortConnections = {}, outputs: PortConnections = {}): this {
    this.assertOpen('add a block');

    const name = block.name();
    if (this.blocks.has(name)) {
      throw new DuplicateBlockNameError(name);
    }

    const delay = block.delay();
    if (!Number.isInteger(delay) || delay < 0) {
      throw new InvalidDelayError(name, delay);
    }

    const inputWiring = this.checkInputs(block, inputs);
    const outputWiring = this.checkOutputs(block, outputs);

    // Commit
    const outputPorts = block.outputPorts();
    for (const [port, signalName] of outputWiring) {
      const output = outputPorts[port];
      if (!output) continue;
      output.bind(signalName);
      this.signals.set(signalName, output.signal);
      this.producers.set(signalName, name);
    }
    this.blocks.set(name, { block, delay, inputs: inputWiring, outputs: outputWiring });

    return this;
  }

  /**
   * Bind inputs, order the blocks and produce the runtime. The builder is
   * closed afterwards.
   */
  build(
    name: string,
    params: SimulationParametersInput,
    options: BuildOptions = {}
  ): Simulation {
    this.assertOpen('build');

    const parsed = SimulationParametersSchema.safeParse(params);
    if (!parsed.success) {
      throw new ParameterError(`${name}.params`, parsed.error.issues.map((i) => i.message).join('; '));
    }

    const bindings = this.resolveInputs();

    const diagnosticGraph = this.buildGraph(true);
    const schedulingGraph = this.buildGraph(false);

    if (options.debug) {
      console.debug(`BUILD_TRACE: Signal graph of '${name}':\n${toDot(diagnosticGraph.toSignalGraph(), name)}`);
    }

    const sorted = schedulingGraph.topologicalSort((ready) => this.orderReady(ready));
    if (!sorted.ok) {
      throw new CycleDetectedError(sorted.cycleNode);
    }

    for (const [input, signal] of bindings) {
      input.connect(signal);
    }

    if (options.debug) {
      console.debug(`BUILD_TRACE: Execution order of '${name}': ${sorted.order.join(' -> ')}`);
    }

    const validateSignals = options.validateSignals ?? false;
    const blocks: Block[] = [];
    for (const blockName of sorted.order) {
      const data = this.blocks.get(blockName);
      if (!data) continue;
      for (const output of Object.values(data.block.outputPorts())) {
        output.setValueValidation(validateSignals);
      }
      blocks.push(data.block);
    }

    this.state = BuilderState.BUILT;

    return new Simulation({
      name,
      blocks,
      signals: new Map(this.signals),
      params: parsed.data,
      schedulingGraph: schedulingGraph.toSignalGraph(),
      diagnosticGraph: diagnosticGraph.toSignalGraph(),
    });
  }

  /**
   * Read the simulation parameters through a parameter store (persisted
   * values over `defaults`), then build.
   */
  buildFromStore(
    name: string,
    store: ParameterStore,
    defaults: SimulationParametersInput,
    options: BuildOptions = {}
  ): Simulation {
    return this.build(name, store.getSystemParams(defaults), options);
  }

  // ============ Wiring Validation ============

  private checkInputs(block: Block, connections: PortConnections): Map<string, string> {
    const name = block.name();
    const ports = block.inputPorts();
    const wiring = new Map<string, string>();

    for (const [port, signal] of Object.entries(connections)) {
      if (!hasOwn(ports, port)) {
        throw new UnknownPortError(name, port);
      }
      wiring.set(port, signal);
    }

    const missing = Object.keys(ports).filter((port) => !wiring.has(port));
    if (missing.length > 0) {
      throw new UnconnectedPortsError(name, missing);
    }

    return wiring;
  }

  private checkOutputs(block: Block, connections: PortConnections): Map<string, string> {
    const name = block.name();
    const ports = block.outputPorts();
    const wiring = new Map<string, string>();
    const claimed = new Set<string>();

    for (const [port, signal] of Object.entries(connections)) {
      if (!hasOwn(ports, port)) {
        throw new UnknownPortError(name, port);
      }
      if (this.signals.has(signal) || claimed.has(signal)) {
        throw new MultipleProducersError(name, port, signal);
      }
      claimed.add(signal);
      wiring.set(port, signal);
    }

    const missing = Object.keys(ports).filter((port) => !wiring.has(port));
    if (missing.length > 0) {
      throw new UnconnectedPortsError(name, missing);
    }

    return wiring;
  }

  /**
   * Resolve and type-check every input without binding any. `build` connects
   * them once ordering has succeeded, so a failing build binds nothing.
   */
  private resolveInputs(): Array<[InputPort, AnySignal]> {
    const bindings: Array<[InputPort, AnySignal]> = [];

    for (const [blockName, data] of this.blocks) {
      const ports = data.block.inputPorts();
      for (const [port, signalName] of data.inputs) {
        const signal = this.signals.get(signalName);
        if (!signal) {
          throw new UnknownSignalError(blockName, port, signalName);
        }
        const input = ports[port];
        if (!input) {
          throw new UnknownPortError(blockName, port);
        }
        if (input.type !== signal.type) {
          throw new SignalTypeError(signalName, input.type.name, signal.type.name, { blockName, port });
        }
        bindings.push([input, signal]);
      }
    }

    return bindings;
  }

  // ============ Graphs ============

  /**
   * One edge per (producer, consumer input) pair sharing a signal. Without
   * `includeDelayed`, edges into blocks that declare a delay are left out.
   */
  private buildGraph(includeDelayed: boolean): DiGraph {
    const graph = new DiGraph();
    for (const name of this.blocks.keys()) {
      graph.addNode(name);
    }

    for (const [consumer, data] of this.blocks) {
      const delayed = data.delay > 0;
      if (delayed && !includeDelayed) continue;
      for (const signal of data.inputs.values()) {
        const producer = this.producers.get(signal);
        if (producer === undefined) continue;
        graph.addEdge({ from: producer, to: consumer, signal, delayed });
      }
    }

    return graph;
  }

  /**
   * Initial ready set: delayed blocks first, so they sample the values the
   * previous step left in their input signals. Among delayed blocks feeding
   * each other, consumers go before producers when that order exists.
   */
  private orderReady(ready: string[]): string[] {
    const delayed = ready.filter((name) => (this.blocks.get(name)?.delay ?? 0) > 0);
    const immediate = ready.filter((name) => (this.blocks.get(name)?.delay ?? 0) === 0);

    const reversed = new DiGraph();
    const delayedSet = new Set(delayed);
    for (const name of delayed) {
      reversed.addNode(name);
    }
    for (const consumer of delayed) {
      const data = this.blocks.get(consumer);
      if (!data) continue;
      for (const signal of data.inputs.values()) {
        const producer = this.producers.get(signal);
        if (producer !== undefined && producer !== consumer && delayedSet.has(producer)) {
          reversed.addEdge({ from: consumer, to: producer, signal, delayed: true });
        }
      }
    }
    const sorted = reversed.topologicalSort();

    return [...(sorted.ok ? sorted.order : delayed), ...immediate];
  }

  private assertOpen(operation: string): void {
    if (this.state !== BuilderState.OPEN) {
      throw new BuilderStateError(operation);
    }
  }
}
