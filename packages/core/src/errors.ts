// src/errors.ts
// Simulation error classes

export type SimulationErrorKind =
  | 'DuplicateBlockName'
  | 'UnknownPort'
  | 'UnknownSignal'
  | 'MultipleProducers'
  | 'UnconnectedPorts'
  | 'TypeError'
  | 'CycleDetected'
  | 'InvalidDelay'
  | 'UnboundPort'
  | 'PortAlreadyBound'
  | 'EmptySignal'
  | 'SignalValue'
  | 'BuilderState'
  | 'Parameter'
  | 'Other';

export class SimulationError extends Error {
  readonly kind: SimulationErrorKind;

  constructor(message: string, kind: SimulationErrorKind = 'Other') {
    super(message);
    this.name = 'SimulationError';
    this.kind = kind;
  }
}

// ============ Build Errors ============

export class DuplicateBlockNameError extends SimulationError {
  constructor(readonly blockName: string) {
    super(`A block named '${blockName}' is already present in the simulation`, 'DuplicateBlockName');
    this.name = 'DuplicateBlockNameError';
  }
}

export class UnknownPortError extends SimulationError {
  constructor(readonly blockName: string, readonly port: string) {
    super(`No port named '${port}' in block '${blockName}'`, 'UnknownPort');
    this.name = 'UnknownPortError';
  }
}

export class UnknownSignalError extends SimulationError {
  constructor(readonly blockName: string, readonly port: string, readonly signal: string) {
    super(
      `Could not connect port '${port}' of block '${blockName}': no signal named '${signal}'`,
      'UnknownSignal'
    );
    this.name = 'UnknownSignalError';
  }
}

export class MultipleProducersError extends SimulationError {
  constructor(readonly blockName: string, readonly port: string, readonly signal: string) {
    super(
      `Cannot connect output '${port}' of block '${blockName}' to signal '${signal}': ` +
        'the signal is already connected to another output',
      'MultipleProducers'
    );
    this.name = 'MultipleProducersError';
  }
}

export class UnconnectedPortsError extends SimulationError {
  constructor(readonly blockName: string, readonly ports: readonly string[]) {
    super(
      `Ports [${ports.map((p) => `'${p}'`).join(', ')}] in block '${blockName}' have not been connected`,
      'UnconnectedPorts'
    );
    this.name = 'UnconnectedPortsError';
  }
}

/** The input port a mistyped signal was wired to. */
export interface PortLocation {
  blockName: string;
  port: string;
}

export class SignalTypeError extends SimulationError {
  readonly blockName: string | undefined;
  readonly port: string | undefined;

  constructor(
    readonly signal: string,
    readonly expected: string,
    readonly actual: string,
    location?: PortLocation
  ) {
    const detail = `Expected signal '${signal}' to be a '${expected}', but is a '${actual}'`;
    super(
      location ? `Cannot connect port '${location.port}' of block '${location.blockName}': ${detail}` : detail,
      'TypeError'
    );
    this.name = 'SignalTypeError';
    this.blockName = location?.blockName;
    this.port = location?.port;
  }
}

export class CycleDetectedError extends SimulationError {
  constructor(readonly blockName: string) {
    super(`Simulation presents a cycle containing block '${blockName}'`, 'CycleDetected');
    this.name = 'CycleDetectedError';
  }
}

export class InvalidDelayError extends SimulationError {
  constructor(readonly blockName: string, readonly delay: number) {
    super(`Block '${blockName}' declares an invalid delay: ${delay}`, 'InvalidDelay');
    this.name = 'InvalidDelayError';
  }
}

export class BuilderStateError extends SimulationError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the simulation has already been built`, 'BuilderState');
    this.name = 'BuilderStateError';
  }
}

// ============ Port Contract Violations ============

export class UnboundPortError extends SimulationError {
  constructor(readonly port: string) {
    super(`Port '${port}' is not bound to a signal`, 'UnboundPort');
    this.name = 'UnboundPortError';
  }
}

export class PortAlreadyBoundError extends SimulationError {
  constructor(readonly port: string, readonly signal: string) {
    super(`Port '${port}' is already bound to signal '${signal}'`, 'PortAlreadyBound');
    this.name = 'PortAlreadyBoundError';
  }
}

export class EmptySignalError extends SimulationError {
  constructor(readonly signal: string) {
    super(`Signal '${signal}' has not been written yet`, 'EmptySignal');
    this.name = 'EmptySignalError';
  }
}

export class SignalValueError extends SimulationError {
  constructor(readonly signal: string, readonly typeName: string, detail: string) {
    super(`Value written to signal '${signal}' is not a valid '${typeName}': ${detail}`, 'SignalValue');
    this.name = 'SignalValueError';
  }
}

// ============ Parameters ============

export class ParameterError extends SimulationError {
  constructor(readonly key: string, detail: string) {
    super(`Invalid parameters for '${key}': ${detail}`, 'Parameter');
    this.name = 'ParameterError';
  }
}
