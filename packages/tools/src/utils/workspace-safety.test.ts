import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "@parley/core";
import { resolveWorkspacePath } from "./workspace-path.js";

test("resolveWorkspacePath allows paths inside the root", () => {
    assert.equal(resolveWorkspacePath("/kb/docs", "guide.md"), "/kb/docs/guide.md");
    assert.equal(resolveWorkspacePath("/kb/docs", "sub/../notes.txt"), "/kb/docs/notes.txt");
});

test("resolveWorkspacePath blocks traversal, absolute paths and the root itself", () => {
    assert.throws(() => resolveWorkspacePath("/kb/docs", "../secrets.txt"), ValidationError);
    assert.throws(() => resolveWorkspacePath("/kb/docs", "/etc/passwd"), /escapes the knowledge base/);
    assert.throws(() => resolveWorkspacePath("/kb/docs", "."), ValidationError);
});
