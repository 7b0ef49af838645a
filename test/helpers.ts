import { expect } from "vitest";

/** Await a promise that must reject with `type`, and return the error. */
export async function rejection<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (e) {
    expect(e).toBeInstanceOf(type);
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error(`expected a ${type.name} rejection`);
}
