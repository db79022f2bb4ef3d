import assert from "node:assert/strict";
import test from "node:test";
import { isExitRequest, tokenizeWords } from "../../screening/exit-detector";

test("exit keywords match as whole words in any case", () => {
  assert.equal(isExitRequest("EXIT"), true);
  assert.equal(isExitRequest("exit now"), true);
  assert.equal(isExitRequest("quit."), true);
  assert.equal(isExitRequest("Ok, bye!"), true);
  assert.equal(isExitRequest("I want to stop"), true);
});

test("words that only contain a keyword do not exit", () => {
  assert.equal(isExitRequest("exiting"), false);
  assert.equal(isExitRequest("stopwatch"), false);
  assert.equal(isExitRequest("backend engineer"), false);
  assert.equal(isExitRequest(""), false);
});

test("tokenizeWords trims punctuation around words", () => {
  assert.deepEqual(tokenizeWords("  Hello, World!  (again) "), ["hello", "world", "again"]);
  assert.deepEqual(tokenizeWords("!!! ..."), []);
});
