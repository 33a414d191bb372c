import assert from "node:assert/strict";
import test from "node:test";

import { dedupeDiagnostics } from "../src/diagnostics/dedupe";
import type { DiagnosticRecord } from "../src/diagnostics/types";

const base: DiagnosticRecord = {
  path: "src/a.cpp",
  line: 4,
  column: 2,
  severity: "warning",
  message: "narrowing conversion",
  check: "bugprone-narrowing-conversions"
};

test("dedupeDiagnostics keeps the first of identical records", () => {
  const result = dedupeDiagnostics([base, { ...base }, { ...base, severity: "error" }]);

  assert.equal(result.records.length, 1);
  assert.equal(result.records[0]?.severity, "warning");
  assert.equal(result.duplicates, 2);
});

test("dedupeDiagnostics treats any identity field difference as a distinct finding", () => {
  const result = dedupeDiagnostics([
    base,
    { ...base, check: "" },
    { ...base, column: 3 },
    { ...base, message: "narrowing conversion!" },
    { ...base, path: "src/b.cpp" }
  ]);

  assert.equal(result.records.length, 5);
  assert.equal(result.duplicates, 0);
});

test("dedupeDiagnostics preserves input order of survivors", () => {
  const second = { ...base, line: 1 };
  const third = { ...base, line: 9 };
  const result = dedupeDiagnostics([third, second, third, base]);

  assert.deepEqual(result.records.map((item) => item.line), [9, 1, 4]);
});

test("dedupeDiagnostics does not confuse separators inside fields", () => {
  const result = dedupeDiagnostics([
    { ...base, message: "a|b", check: "c" },
    { ...base, message: "a", check: "b|c" }
  ]);

  assert.equal(result.records.length, 2);
});
