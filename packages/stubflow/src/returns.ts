/**
 * Return type tokens.
 *
 * TypeScript erases a method's declared return type, so each interface method
 * carries a token describing it: whether it is void, the value a non-sync call
 * resolves with, and how a handle parses the raw result into the declared
 * type.
 *
 * @example
 * ```typescript
 * returns.string();                       // zero ""
 * returns.void();
 * returns.value<Order>({ name: "Order", zero: EMPTY_ORDER, parse: parseOrder });
 * ```
 */

/**
 * A void declared return.
 */
export interface VoidReturn {
  readonly kind: "void";
  readonly name: "void";
}

/**
 * A non-void declared return.
 */
export interface ValueReturn<R> {
  readonly kind: "value";
  /** Name used in error messages and by handles that convert payloads. */
  readonly name: string;
  /** Value a typed call resolves with outside sync mode. */
  readonly zero: R;
  /** Parses a raw result into `R`. Applied by the handle, once per result. */
  readonly parse?: (value: unknown) => R;
}

export type ReturnSpec<R> = VoidReturn | ValueReturn<R>;

const VOID: VoidReturn = Object.freeze({ kind: "void" as const, name: "void" as const });

function primitive<R>(name: string, zero: R, parse: (value: unknown) => R): ValueReturn<R> {
  return Object.freeze({ kind: "value" as const, name, zero, parse });
}

function assertResultType<R>(
  name: string,
  guard: (value: unknown) => value is R
): (value: unknown) => R {
  return (value) => {
    if (!guard(value)) {
      throw new TypeError(`Expected workflow result of type ${name}, got ${typeof value}`);
    }
    return value;
  };
}

const isString = (value: unknown): value is string => typeof value === "string";
const isNumber = (value: unknown): value is number => typeof value === "number";
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isBigint = (value: unknown): value is bigint => typeof value === "bigint";

export const returns = {
  void: (): VoidReturn => VOID,
  string: (): ValueReturn<string> => primitive("string", "", assertResultType("string", isString)),
  number: (): ValueReturn<number> => primitive("number", 0, assertResultType("number", isNumber)),
  boolean: (): ValueReturn<boolean> =>
    primitive("boolean", false, assertResultType("boolean", isBoolean)),
  bigint: (): ValueReturn<bigint> => primitive("bigint", 0n, assertResultType("bigint", isBigint)),
  value: <R>(spec: { name: string; zero: R; parse?: (value: unknown) => R }): ValueReturn<R> =>
    Object.freeze({ kind: "value" as const, ...spec }),
} as const;

/**
 * Value a typed call resolves with when the real result is delivered elsewhere.
 */
export function zeroValueOf<R>(spec: ReturnSpec<R>): R | undefined {
  return spec.kind === "void" ? undefined : spec.zero;
}
