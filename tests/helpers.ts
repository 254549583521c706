import { minterm, MinimizerError, type ErrorCode, type Implicant } from "../src";

export function hasCode(code: ErrorCode) {
  return (error: unknown): boolean => error instanceof MinimizerError && error.code === code;
}

// Hand-built implicant for algebra tests; only identity and label matter there.
export function implicant(label: string, values: number[], commonMask = 0): Implicant {
  return { members: values.map(v => minterm(v)), commonMask, label };
}

export function memberValues(implicants: readonly Implicant[]): number[][] {
  return implicants.map(i => i.members.map(m => m.value));
}
