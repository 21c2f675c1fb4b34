import type { SourceLocation } from "./location.js";

export type AssertionKind =
  | "assertEqual"
  | "assertNotEqual"
  | "assertTrue"
  | "assertFalse"
  | "assertNull"
  | "assertNotNull"
  | "assertThrows"
  | "assertRejects"
  | "assertMatches"
  | "verify"
  | "verifyNoOtherCalls"
  | "unconfiguredInvocation"
  | "fail";

export interface AssertionFailure {
  readonly kind: AssertionKind;
  readonly message: string;
  readonly expected?: unknown;
  readonly actual?: unknown;
  readonly location?: SourceLocation;
}
