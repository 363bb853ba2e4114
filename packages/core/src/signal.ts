// src/signal.ts
// Type-erased signal cells shared between one producer and many consumers

import { SignalTypeError, SimulationError } from './errors.js';
import type { SignalType } from './type-registry.js';
import { copyValue } from './utils.js';

/**
 * A named value slot of a fixed payload type. The producer's output port owns
 * the cell; consumers' input ports hold references to the same instance, so a
 * write is visible to every holder. Reads hand out copies of object payloads,
 * so only the producer can change what the cell holds.
 */
export class Signal<T> {
  private value: T | undefined = undefined;
  private _name: string | undefined;

  constructor(
    readonly type: SignalType<T>,
    name?: string
  ) {
    this._name = name;
  }

  get name(): string {
    return this._name ?? '<unnamed>';
  }

  get isNamed(): boolean {
    return this._name !== undefined;
  }

  /** Give the cell its global name. A cell is named once. */
  assignName(name: string): void {
    if (this._name !== undefined) {
      throw new SimulationError(`Signal '${this._name}' cannot be renamed to '${name}'`);
    }
    this._name = name;
  }

  get hasValue(): boolean {
    return this.value !== undefined;
  }

  /** Typed read, for holders that checked the type at bind time. */
  read(): T | undefined {
    return copyValue(this.value);
  }

  /** Typed write, for holders that checked the type at bind time. */
  write(value: T): void {
    this.value = value;
  }

  clear(): void {
    this.value = undefined;
  }

  /**
   * Read through a type token. Throws `SignalTypeError` unless `type` is the
   * cell's own type.
   */
  get<U>(type: SignalType<U>): U | undefined {
    return checked(this, type).read();
  }

  /** Write through a type token, with the same check as `get`. */
  set<U>(type: SignalType<U>, value: U): void {
    checked(this, type).write(value);
  }
}

export type AnySignal = Signal<unknown>;

/**
 * Narrow an erased signal to its payload type.
 */
export function isSignalOf<T>(signal: AnySignal, type: SignalType<T>): signal is Signal<T> {
  return signal.type === type;
}

function checked<U>(signal: AnySignal, type: SignalType<U>): Signal<U> {
  if (!isSignalOf(signal, type)) {
    throw new SignalTypeError(signal.name, type.name, signal.type.name);
  }
  return signal;
}
