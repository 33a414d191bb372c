import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_SUPPRESSION_POLICY } from "../src/commands/shared/reportConfig";
import {
  applySuppression,
  createSuppressionPolicy,
  evaluateSuppression,
  mergeSuppressionPolicies
} from "../src/diagnostics/suppression";
import type { DiagnosticRecord } from "../src/diagnostics/types";

function record(overrides: Partial<DiagnosticRecord> = {}): DiagnosticRecord {
  return {
    path: "src/main.cpp",
    line: 1,
    column: 1,
    severity: "warning",
    message: "something happened",
    check: "",
    ...overrides
  };
}

test("notes are dropped even with an empty policy", () => {
  const policy = createSuppressionPolicy();
  assert.equal(evaluateSuppression(record({ severity: "note" }), policy), "note");
  assert.equal(evaluateSuppression(record(), policy), null);
});

test("excluded checks drop only matching records", () => {
  const policy = createSuppressionPolicy({ excludedChecks: ["bugprone-foo"] });
  const { kept, suppressed } = applySuppression(
    [record({ check: "bugprone-foo" }), record({ check: "bugprone-bar" })],
    policy
  );

  assert.deepEqual(kept.map((item) => item.check), ["bugprone-bar"]);
  assert.equal(suppressed["excluded-check"], 1);
});

test("header-only checks drop header diagnostics and keep implementation files", () => {
  const policy = createSuppressionPolicy({ headerOnlyExcludedChecks: ["readability-magic-numbers"] });
  const header = record({ path: "include/api.hpp", message: "magic number", check: "readability-magic-numbers" });
  const source = record({ path: "src/api.cpp", message: "magic number", check: "readability-magic-numbers" });

  assert.equal(evaluateSuppression(header, policy), "header-check");
  assert.equal(evaluateSuppression(source, policy), null);
});

test("header-only severities apply only to header paths", () => {
  const policy = createSuppressionPolicy({ headerOnlyExcludedSeverities: ["warning"] });

  assert.equal(evaluateSuppression(record({ path: "include/x.h" }), policy), "header-severity");
  assert.equal(evaluateSuppression(record({ path: "src/x.cpp" }), policy), null);
  assert.equal(evaluateSuppression(record({ path: "include/x.h", severity: "error" }), policy), null);
});

test("default header-only note severity is never reached because notes drop first", () => {
  assert.equal(DEFAULT_SUPPRESSION_POLICY.headerOnlyExcludedSeverities.has("note"), true);
  assert.equal(evaluateSuppression(record({ path: "include/x.h", severity: "note" }), DEFAULT_SUPPRESSION_POLICY), "note");
});

test("path exclusion runs before check exclusion", () => {
  const policy = createSuppressionPolicy({ excludedPaths: ["src/gen.cpp"], excludedChecks: ["c"] });

  assert.equal(evaluateSuppression(record({ path: "src/gen.cpp", check: "c" }), policy), "excluded-path");
  assert.equal(evaluateSuppression(record({ path: "src/gen.cpp.bak", check: "other" }), policy), null);
});

test("path prefixes match as raw string prefixes", () => {
  const bare = createSuppressionPolicy({ excludedPathPrefixes: ["vendor"] });
  assert.equal(evaluateSuppression(record({ path: "vendor/x.cpp" }), bare), "excluded-path-prefix");
  // No segment boundary check: a prefix without a slash reaches sibling directories.
  assert.equal(evaluateSuppression(record({ path: "vendored/x.cpp" }), bare), "excluded-path-prefix");

  const slashed = createSuppressionPolicy({ excludedPathPrefixes: ["third_party/"] });
  assert.equal(evaluateSuppression(record({ path: "third_party/lib/x.cpp" }), slashed), "excluded-path-prefix");
  assert.equal(evaluateSuppression(record({ path: "third_party_extra/x.cpp" }), slashed), null);
});

test("message substrings drop records whose message contains them", () => {
  const policy = createSuppressionPolicy({ excludedMessageSubstrings: ["unknown type name"] });

  assert.equal(evaluateSuppression(record({ message: "error: unknown type name 'Foo'" }), policy), "excluded-message");
  assert.equal(evaluateSuppression(record({ message: "unknown Type Name" }), policy), null);
});

test("empty entries never enter a policy", () => {
  const policy = createSuppressionPolicy({ excludedMessageSubstrings: [""], excludedChecks: ["", "c"] });

  assert.equal(policy.excludedMessageSubstrings.size, 0);
  assert.deepEqual(Array.from(policy.excludedChecks), ["c"]);
  assert.equal(evaluateSuppression(record(), policy), null);
});

test("policies are frozen and merging returns a new policy", () => {
  const base = createSuppressionPolicy({ excludedChecks: ["a"] });
  const merged = mergeSuppressionPolicies(base, { excludedChecks: ["b"], excludedPaths: ["x.cpp"] });

  assert.equal(Object.isFrozen(base), true);
  assert.deepEqual(Array.from(base.excludedChecks), ["a"]);
  assert.deepEqual(Array.from(merged.excludedChecks), ["a", "b"]);
  assert.deepEqual(Array.from(merged.excludedPaths), ["x.cpp"]);
});
