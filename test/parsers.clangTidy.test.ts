import assert from "node:assert/strict";
import test from "node:test";

import { normalizeLexically } from "../src/diagnostics/paths";
import { clangTidyParser, iterateDiagnostics, parseDiagnosticLine, parseDiagnosticLog } from "../src/parsers/clangTidy";
import type { ParserContext } from "../src/parsers/types";

const context: ParserContext = {
  source: "unit",
  normalizePath: normalizeLexically
};

test("clang-tidy parser extracts a warning with its check", () => {
  const records = clangTidyParser.parse(
    ["src/foo.cpp:10:5: warning: unused variable 'x' [misc-unused-parameters]"],
    context
  );

  assert.equal(records.length, 1);
  assert.deepEqual(records[0], {
    path: "src/foo.cpp",
    line: 10,
    column: 5,
    severity: "warning",
    message: "unused variable 'x'",
    check: "misc-unused-parameters"
  });
});

test("clang-tidy parser leaves check empty when no bracket suffix is present", () => {
  const record = parseDiagnosticLine("src/a.cpp:3:1: error: expected ';' after expression", context);

  assert.equal(record?.severity, "error");
  assert.equal(record?.message, "expected ';' after expression");
  assert.equal(record?.check, "");
});

test("clang-tidy parser ignores surrounding whitespace", () => {
  const record = parseDiagnosticLine("   src/a.cpp:3:1: warning: shadowed name   [bugprone-shadow]  \t", context);

  assert.equal(record?.message, "shadowed name");
  assert.equal(record?.check, "bugprone-shadow");
});

test("clang-tidy parser keeps brackets inside the message and takes only the trailing check", () => {
  const record = parseDiagnosticLine(
    "src/a.cpp:1:1: warning: add [[nodiscard]] to this function [modernize-use-nodiscard]",
    context
  );

  assert.equal(record?.message, "add [[nodiscard]] to this function");
  assert.equal(record?.check, "modernize-use-nodiscard");
});

test("clang-tidy parser keeps note diagnostics for later suppression", () => {
  const record = parseDiagnosticLine("src/a.cpp:7:2: note: previous declaration is here", context);

  assert.equal(record?.severity, "note");
  assert.equal(record?.check, "");
});

test("clang-tidy parser skips lines outside the diagnostic grammar", () => {
  const records = clangTidyParser.parse(
    [
      "1 warning generated.",
      "In file included from src/a.cpp:1:",
      "src/a.cpp:3:1: remark: not a severity",
      "src/a.cpp:3: warning: missing column",
      "src/a.cpp:3:1: warning:",
      "    int x = 0;",
      "        ^",
      ""
    ],
    context
  );

  assert.deepEqual(records, []);
});

test("clang-tidy parser skips zero line or column positions", () => {
  assert.equal(parseDiagnosticLine("src/a.cpp:0:4: warning: bad position [c]", context), null);
  assert.equal(parseDiagnosticLine("src/a.cpp:4:0: warning: bad position [c]", context), null);
});

test("clang-tidy parser skips positions beyond the safe integer range", () => {
  assert.equal(parseDiagnosticLine("a.cpp:90071992547409921:1: warning: first [c]", context), null);
  assert.equal(parseDiagnosticLine("a.cpp:1:90071992547409922: warning: second [c]", context), null);
  assert.equal(parseDiagnosticLine(`a.cpp:${Number.MAX_SAFE_INTEGER}:1: warning: edge [c]`, context)?.line, Number.MAX_SAFE_INTEGER);

  const parsed = parseDiagnosticLog(
    "big.log",
    ["a.cpp:90071992547409921:1: warning: first [c]", "a.cpp:90071992547409922:1: warning: second [c]"].join("\n")
  );
  assert.equal(parsed.records.length, 0);
  assert.equal(parsed.unmatchedLines, 2);
});

test("clang-tidy parser normalizes the diagnostic path", () => {
  const record = parseDiagnosticLine("./src/../src//foo.cpp:1:2: warning: message [check]", context);

  assert.equal(record?.path, "src/foo.cpp");
});

test("iterateDiagnostics yields records lazily", () => {
  const iterator = iterateDiagnostics(
    ["noise", "a.cpp:1:1: warning: first [c1]", "b.cpp:2:2: warning: second [c2]"],
    context
  );

  const first = iterator.next();
  assert.equal(first.done, false);
  assert.equal(first.value?.path, "a.cpp");
});

test("parseDiagnosticLog counts unmatched non-blank lines", () => {
  const parsed = parseDiagnosticLog(
    "ci.log",
    "a.cpp:1:1: warning: x [c]\r\nnoise\n\nb.cpp:2:2: error: y\n"
  );

  assert.equal(parsed.source, "ci.log");
  assert.equal(parsed.records.length, 2);
  assert.equal(parsed.records[1]?.path, "b.cpp");
  assert.equal(parsed.unmatchedLines, 1);
});
