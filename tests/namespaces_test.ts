import { test } from "node:test";
import assert from "node:assert/strict";
import { isAknVersion, resolveNamespace, versionOf } from "../src/core/domain/parse/namespaces.ts";
import { ValidationError } from "../src/core/shared/errors.ts";
import { AKN2, AKN3 } from "./helpers.ts";

test("resolveNamespace prefers the highest version declared", () => {
  assert.equal(resolveNamespace([AKN2, AKN3]), AKN3);
  assert.equal(resolveNamespace([AKN2]), AKN2);
});

test("resolveNamespace ignores unrelated namespaces", () => {
  assert.equal(resolveNamespace(["http://www.w3.org/1999/xhtml", AKN2]), AKN2);
});

test("resolveNamespace names the expected and found namespaces when none match", () => {
  assert.throws(() => resolveNamespace(["urn:other"]), {
    name: "ValidationError",
    message:
      `Expected to find one of the following Akoma Ntoso XML namespaces: ${AKN3}, ${AKN2}. ` +
      "Only these namespaces were found: urn:other",
  });
});

test("resolveNamespace compares version labels numerically", () => {
  const table = { "9.0": "urn:nine", "10.0": "urn:ten" };
  assert.equal(resolveNamespace(["urn:nine", "urn:ten"], table), "urn:ten");
});

test("resolveNamespace error carries expected and actual namespaces", () => {
  try {
    resolveNamespace([]);
    assert.fail("expected a ValidationError");
  } catch (err) {
    assert.ok(err instanceof ValidationError);
    assert.deepEqual(err.context, { expected: [AKN3, AKN2], actual: [] });
  }
});

test("versionOf and isAknVersion", () => {
  assert.equal(versionOf(AKN3), "3.0");
  assert.equal(versionOf("urn:other"), undefined);
  assert.equal(isAknVersion("2.0"), true);
  assert.equal(isAknVersion("4.0"), false);
});
