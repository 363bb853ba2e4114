// src/numeric/ode.ts
// Fixed-step integrators for block-internal state (dy/dt = f(t, y))

export type Derivative = (t: number, y: readonly number[]) => number[];

export type OdeSolver = (f: Derivative, t0: number, dt: number, y0: readonly number[]) => number[];

function axpy(y: readonly number[], a: number, x: readonly number[]): number[] {
  return y.map((v, i) => v + a * (x[i] ?? 0));
}

export const forwardEuler: OdeSolver = (f, t0, dt, y0) => axpy(y0, dt, f(t0, y0));

/** Classic fourth-order Runge-Kutta step. */
export const rungeKutta4: OdeSolver = (f, t0, dt, y0) => {
  const half = dt / 2;
  const k1 = f(t0, y0);
  const k2 = f(t0 + half, axpy(y0, half, k1));
  const k3 = f(t0 + half, axpy(y0, half, k2));
  const k4 = f(t0 + dt, axpy(y0, dt, k3));

  return y0.map(
    (v, i) => v + (dt / 6) * ((k1[i] ?? 0) + 2 * (k2[i] ?? 0) + 2 * (k3[i] ?? 0) + (k4[i] ?? 0))
  );
};
