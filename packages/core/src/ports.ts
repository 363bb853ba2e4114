// src/ports.ts
// Typed input/output handles bound to signal cells

import {
  EmptySignalError,
  PortAlreadyBoundError,
  SignalTypeError,
  SignalValueError,
  UnboundPortError,
} from './errors.js';
import { isSignalOf, Signal, type AnySignal } from './signal.js';
import type { AnySignalType, SignalType } from './type-registry.js';

// ============ Erased Port Views ============

/** What the builder sees of an input port. */
export interface InputPort {
  readonly name: string;
  readonly type: AnySignalType;
  readonly isBound: boolean;
  connect(signal: AnySignal): void;
}

/** What the builder sees of an output port. */
export interface OutputPort {
  readonly name: string;
  readonly type: AnySignalType;
  readonly signal: AnySignal;
  readonly isBound: boolean;
  bind(signalName: string): void;
  setValueValidation(enabled: boolean): void;
}

// ============ Input ============

export class Input<T> implements InputPort {
  private signal: Signal<T> | null = null;

  constructor(
    readonly name: string,
    readonly type: SignalType<T>
  ) {}

  get isBound(): boolean {
    return this.signal !== null;
  }

  /** Name of the bound signal. */
  get signalName(): string {
    return this.bound().name;
  }

  /**
   * Bind this port to a signal. The signal must carry this port's type, and a
   * port is bound once.
   */
  connect(signal: AnySignal): void {
    if (this.signal !== null) {
      throw new PortAlreadyBoundError(this.name, this.signal.name);
    }
    if (!isSignalOf(signal, this.type)) {
      throw new SignalTypeError(signal.name, this.type.name, signal.type.name);
    }
    this.signal = signal;
  }

  /** Current value. Throws if the producer has not written the signal yet. */
  get(): T {
    const signal = this.bound();
    const value = signal.read();
    if (value === undefined) {
      throw new EmptySignalError(signal.name);
    }
    return value;
  }

  tryGet(): T | undefined {
    return this.bound().read();
  }

  private bound(): Signal<T> {
    if (this.signal === null) {
      throw new UnboundPortError(this.name);
    }
    return this.signal;
  }
}

// ============ Output ============

export class Output<T> implements OutputPort {
  readonly signal: Signal<T>;
  private _isBound = false;
  private validateValues = false;

  constructor(
    readonly name: string,
    readonly type: SignalType<T>
  ) {
    this.signal = new Signal<T>(type);
  }

  get isBound(): boolean {
    return this._isBound;
  }

  get signalName(): string {
    return this.signal.name;
  }

  /** Publish the owned signal under its global name. */
  bind(signalName: string): void {
    if (this._isBound) {
      throw new PortAlreadyBoundError(this.name, this.signal.name);
    }
    this.signal.assignName(signalName);
    this._isBound = true;
  }

  /** Check every written value against the type's schema. */
  setValueValidation(enabled: boolean): void {
    this.validateValues = enabled;
  }

  set(value: T): void {
    if (!this._isBound) {
      throw new UnboundPortError(this.name);
    }
    if (this.validateValues) {
      const result = this.type.validate(value);
      if (!result.success) {
        throw new SignalValueError(this.signal.name, this.type.name, result.error);
      }
    }
    this.signal.write(value);
  }

  /** Last value written this run, if any. */
  peek(): T | undefined {
    return this.signal.read();
  }
}
