// Assertion API
export { assert, createAssertions, check } from "./assert/api.js";
export type { Assert, ErrorClass } from "./assert/api.js";
export { AssertionCollector } from "./assert/collector.js";
export { compare, deepEqual, kindOf } from "./assert/equality.js";
export type { Comparison } from "./assert/equality.js";
export { locateCaller } from "./assert/location.js";
export type { SourceLocation } from "./assert/location.js";
export type { AssertionFailure, AssertionKind } from "./assert/types.js";

// Faults
export {
  AssertionFailed,
  UnconfiguredInvocation,
  FixtureFault,
  TimeoutFault,
  MockOwnershipFault,
  DiscoveryError,
  toFaultRecord,
  describeValue,
} from "./errors.js";
export type { FaultKind, FaultRecord } from "./errors.js";

// Mock Engine
export { defineCapability, defaultValue, RETURN_KINDS } from "./mock/capability.js";
export type { CapabilitySpec, MemberSpec, ReturnKind, Members, MemberResult } from "./mock/capability.js";
export { any, where, equals, on } from "./mock/matchers.js";
export type { ArgMatcher, MemberMatcher } from "./mock/matchers.js";
export { Mock, Expectation, createMock, setup, verify, verifyNoOtherCalls, resetMock } from "./mock/mock.js";
export type { MockMode, MockOptions, ExpectationBuilder, FaultFactory } from "./mock/mock.js";
export type { Invocation } from "./mock/log.js";

// Fixture Manager
export {
  runWithFixture,
  defineFixture,
  useFixture,
  composeFixtures,
  DEFAULT_GRACE_MS,
} from "./fixture/fixture.js";
export type { Fixture, FixtureOptions, FixtureOutcome, PhaseResult, Hook } from "./fixture/fixture.js";
export type { GroupContext, GroupFixture } from "./fixture/group.js";

// Suites
export { suite } from "./suite/api.js";
export type { SuiteContext, SuiteDefinition, SuiteTest, SharedFixture } from "./suite/api.js";
export type {
  TestContext,
  TestFn,
  TestSource,
  TestResult,
  TestStatus,
  FinalStatus,
  UnitIdentity,
} from "./suite/types.js";
export { TestUnit } from "./suite/unit.js";

// Code Loader
export { loadSuiteFiles } from "./suite/code-loader.js";
export { validateSource } from "./suite/validator.js";
export type { ValidationResult } from "./suite/validator.js";

// Runner
export { TestRunner, discover, run, summarize, filterUnits, DEFAULT_TIMEOUT_MS } from "./runner.js";
export type { RunnerOptions, RunSummary, FailureDetail, UnitFilter } from "./runner.js";

// Reporter
export { printTerminalReport } from "./report/terminal.js";
export { generateJsonReport, buildJsonReport } from "./report/json.js";
export type { JsonReport, JsonResult } from "./report/json.js";
