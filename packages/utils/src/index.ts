export const pkg = "@enumset/utils";

export function assert(cond: unknown, msg = "Assertion failed"): asserts cond {
  if (!cond) throw new Error(msg);
}

// Ветка, до которой исполнение дойти не может при соблюдении контракта
export function unreachable(msg = "entered unreachable code"): never {
  throw new Error(msg);
}

// Количество единичных бит в 32-битном слове
export function popcount32(x: number): number {
  let v = x >>> 0;
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  v = (v + (v >>> 4)) & 0x0f0f0f0f;
  return Math.imul(v, 0x01010101) >>> 24;
}
