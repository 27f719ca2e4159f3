import test from "node:test";
import assert from "node:assert/strict";
import { findBalancedObjectEnd, parseJsonObject } from "./json-fallback-parser.js";

test("parseJsonObject parses direct JSON objects", () => {
    const result = parseJsonObject(' {"a":1} ');
    assert.equal(result.success, true);
    assert.deepEqual(result.data, { a: 1 });
});

test("parseJsonObject rejects arrays and scalars", () => {
    assert.equal(parseJsonObject("[1,2]").success, false);
    assert.equal(parseJsonObject("42").success, false);
    assert.equal(parseJsonObject("").error, "Empty input");
});

test("findBalancedObjectEnd ignores braces inside strings", () => {
    const text = 'x {"a":"}{","b":{"c":1}} tail';
    const end = findBalancedObjectEnd(text, 2);
    assert.equal(end, text.indexOf(" tail") - 1);
});

test("findBalancedObjectEnd returns undefined for unbalanced input", () => {
    assert.equal(findBalancedObjectEnd('{"a":{"b":1}', 0), undefined);
    assert.equal(findBalancedObjectEnd("no brace", 0), undefined);
});
