import { z } from "zod";

export const RETURN_KINDS = ["void", "number", "string", "boolean", "array", "object", "absent"] as const;

export type ReturnKind = (typeof RETURN_KINDS)[number];

export interface MemberSpec {
  arity: number;
  returns: ReturnKind;
  /** Results are delivered as promises. */
  async?: boolean;
}

/** Names of the callable members of `T`. */
export type Members<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/** Resolved result type of member `K` of `T`. */
export type MemberResult<T, K> = K extends keyof T
  ? T[K] extends (...args: never[]) => infer R
    ? Awaited<R>
    : never
  : never;

export interface CapabilitySpec<T> {
  readonly name: string;
  readonly members: { readonly [K in Members<T>]: MemberSpec };
}

const memberSchema = z.object({
  arity: z.number().int().nonnegative(),
  returns: z.enum(RETURN_KINDS),
  async: z.boolean().optional(),
});

const capabilitySchema = z.object({
  name: z.string().trim().min(1, "capability name must not be empty"),
  members: z
    .record(memberSchema)
    .refine((members) => Object.keys(members).length > 0, "capability must declare at least one member"),
});

/**
 * Describes an interface a mock can stand in for. Every callable member of
 * `T` must be listed with its arity and the kind of value it returns.
 *
 * @example
 * ```ts
 * interface Clock { now(): number; sleep(ms: number): Promise<void> }
 * const ClockSpec = defineCapability<Clock>("Clock", {
 *   now: { arity: 0, returns: "number" },
 *   sleep: { arity: 1, returns: "void", async: true },
 * });
 * ```
 */
export function defineCapability<T>(
  name: string,
  members: CapabilitySpec<T>["members"]
): CapabilitySpec<T> {
  capabilitySchema.parse({ name, members });
  return Object.freeze({ name, members: Object.freeze({ ...members }) });
}

/** The zero/empty/absent value a lenient mock answers with. */
export function defaultValue(spec: MemberSpec): unknown {
  const value = zeroOf(spec.returns);
  return spec.async ? Promise.resolve(value) : value;
}

function zeroOf(kind: ReturnKind): unknown {
  switch (kind) {
    case "void":
      return undefined;
    case "number":
      return 0;
    case "string":
      return "";
    case "boolean":
      return false;
    case "array":
      return [];
    case "object":
      return {};
    case "absent":
      return null;
  }
}
