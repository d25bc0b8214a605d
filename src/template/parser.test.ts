/**
 * Tokenizer and parser tests.
 *
 * Run: node --import tsx src/template/parser.test.ts
 *
 * Tests cover:
 *   1. Tokenizer: literals, tags, control tags, unclosed tags
 *   2. Part splitting: whitespace, tabs, quoted runs
 *   3. Pipes and params: separators, precedence, empty keys/values
 *   4. For-loop headers: ranges, collections, syntax errors
 *   5. Block matching: nesting, unterminated blocks
 */

import { strict as assert } from "node:assert";

import { tokenize } from "./tokenizer.js";
import { parseParam, parseTag, splitParts, splitPipe } from "./params.js";
import { parseForLoop } from "./for-loop.js";
import { collectForBody } from "./blocks.js";
import { TemplateError, type TemplateErrorKind } from "./errors.js";
import type { TagContent, Token } from "./tokens.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function assertTemplateError(fn: () => unknown, kind: TemplateErrorKind, message: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof TemplateError, "should throw TemplateError");
    assert.equal(err.kind, kind);
    assert.equal(err.message, message);
    return true;
  });
}

function tagAt(tokens: Token[], index: number): TagContent {
  const token = tokens[index];
  assert.ok(token !== undefined && token.kind === "tag", `token ${index} should be a tag`);
  return token.tag;
}

// ═══════════════════════════════════════════════════════════════════════════
// TOKENIZER
// ═══════════════════════════════════════════════════════════════════════════

section("Tokenizer — Literals");

test("plain text is a single literal", () => {
  assert.deepEqual(tokenize("hello world"), [{ kind: "literal", text: "hello world" }]);
});

test("empty input yields no tokens", () => {
  assert.deepEqual(tokenize(""), []);
});

test("whitespace and newlines are preserved exactly", () => {
  const text = "  line one\n\n\tline two  \r\n";
  assert.deepEqual(tokenize(text), [{ kind: "literal", text }]);
});

test("a lone %} outside a tag is literal text", () => {
  assert.deepEqual(tokenize("100%} done"), [{ kind: "literal", text: "100%} done" }]);
});

section("Tokenizer — Tags");

test("simple tag", () => {
  const tokens = tokenize("{% date %}");
  assert.equal(tokens.length, 1);
  const tag = tagAt(tokens, 0);
  assert.equal(tag.name, "date");
  assert.equal(tag.params.size, 0);
  assert.equal(tag.pipe, undefined);
});

test("tag with params", () => {
  const tag = tagAt(tokenize("{% date minus=1d %}"), 0);
  assert.equal(tag.name, "date");
  assert.equal(tag.params.get("minus"), "1d");
});

test("tag body is trimmed", () => {
  const tag = tagAt(tokenize("{%    result\t %}"), 0);
  assert.equal(tag.name, "result");
});

test("tag without inner spaces", () => {
  const tag = tagAt(tokenize("{%sender%}"), 0);
  assert.equal(tag.name, "sender");
});

test("mixed content", () => {
  const tokens = tokenize("Hello {% custom:name %}, today is {% date %}");
  assert.equal(tokens.length, 4);
  assert.deepEqual(tokens[0], { kind: "literal", text: "Hello " });
  assert.equal(tagAt(tokens, 1).name, "custom:name");
  assert.deepEqual(tokens[2], { kind: "literal", text: ", today is " });
  assert.equal(tagAt(tokens, 3).name, "date");
});

test("adjacent tags produce no empty literal", () => {
  const tokens = tokenize("{% date %}{% result %}");
  assert.equal(tokens.length, 2);
  assert.equal(tagAt(tokens, 0).name, "date");
  assert.equal(tagAt(tokens, 1).name, "result");
});

test("whitespace between tags is a literal", () => {
  const tokens = tokenize("{% date %} {% result %}");
  assert.equal(tokens.length, 3);
  assert.deepEqual(tokens[1], { kind: "literal", text: " " });
});

test("trailing literal after last tag", () => {
  const tokens = tokenize("{% result %} end");
  assert.deepEqual(tokens[1], { kind: "literal", text: " end" });
});

test("tag with pipe", () => {
  const tag = tagAt(tokenize("{% i.result | summary %}"), 0);
  assert.equal(tag.name, "i.result");
  assert.equal(tag.pipe, "summary");
});

test("quoted param keeps spaces and quotes", () => {
  const tag = tagAt(tokenize('{% cmd arg="hello world" %}'), 0);
  assert.equal(tag.name, "cmd");
  assert.equal(tag.params.get("arg"), '"hello world"');
});

test("colon separator in tag param", () => {
  const tag = tagAt(tokenize("{% date limit:5 %}"), 0);
  assert.equal(tag.params.get("limit"), "5");
});

section("Tokenizer — Errors");

test("unclosed tag", () => {
  assertTemplateError(() => tokenize("{% date"), "UnclosedTag", "unclosed tag: missing '%}'");
});

test("unclosed tag after valid content", () => {
  assertTemplateError(
    () => tokenize("ok {% date %} then {% result"),
    "UnclosedTag",
    "unclosed tag: missing '%}'"
  );
});

test("empty tag", () => {
  assertTemplateError(() => tokenize("{% %}"), "EmptyTag", "empty tag");
});

test("tag with only a pipe is empty", () => {
  assertTemplateError(() => tokenize("{% | summary %}"), "EmptyTag", "empty tag");
});

test("param without separator", () => {
  assertTemplateError(
    () => tokenize("{% date yesterday %}"),
    "InvalidParam",
    "invalid parameter (missing '=' or ':'): 'yesterday'"
  );
});

section("Tokenizer — Control Tags");

test("for range and endfor", () => {
  const tokens = tokenize("{% for i in (1..3) %}{% endfor %}");
  assert.deepEqual(tokens, [
    {
      kind: "forStart",
      loop: { variable: "i", iterable: { kind: "range", start: 1, end: 3 }, params: new Map() },
    },
    { kind: "forEnd" },
  ]);
});

test("for collection with limit", () => {
  const tokens = tokenize("{% for i in memories limit:3 %}{% endfor %}");
  const first = tokens[0];
  assert.ok(first !== undefined && first.kind === "forStart");
  assert.equal(first.loop.variable, "i");
  assert.deepEqual(first.loop.iterable, { kind: "collection", name: "memories" });
  assert.equal(first.loop.params.get("limit"), "3");
  assert.deepEqual(tokens[1], { kind: "forEnd" });
});

test("nested for loops tokenize flat", () => {
  const tokens = tokenize(
    "{% for i in (1..2) %}{% for j in (3..4) %}{% endfor %}{% endfor %}"
  );
  assert.deepEqual(
    tokens.map((t) => (t.kind === "forStart" ? `for:${t.loop.variable}` : t.kind)),
    ["for:i", "for:j", "forEnd", "forEnd"]
  );
});

test("endfor with surrounding whitespace", () => {
  assert.deepEqual(tokenize("{%   endfor   %}"), [{ kind: "forEnd" }]);
});

test("'for' without a header is a regular tag", () => {
  assert.equal(tagAt(tokenize("{% for %}"), 0).name, "for");
});

test("missing collection name", () => {
  assertTemplateError(
    () => tokenize("{% for i in %}"),
    "InvalidForLoopSyntax",
    "invalid for loop syntax: 'for i in'"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// PART SPLITTING
// ═══════════════════════════════════════════════════════════════════════════

section("Part Splitting");

test("simple", () => {
  assert.deepEqual(splitParts("date minus=1d"), ["date", "minus=1d"]);
});

test("quoted run stays together", () => {
  assert.deepEqual(splitParts('cmd arg="hello world"'), ["cmd", 'arg="hello world"']);
});

test("multiple spaces collapse", () => {
  assert.deepEqual(splitParts("date  minus=1d"), ["date", "minus=1d"]);
});

test("tabs separate", () => {
  assert.deepEqual(splitParts("date\tminus=1d"), ["date", "minus=1d"]);
});

test("empty input", () => {
  assert.deepEqual(splitParts(""), []);
});

test("single part", () => {
  assert.deepEqual(splitParts("date"), ["date"]);
});

test("tab inside quotes is kept", () => {
  assert.deepEqual(splitParts('a="x\ty" b=1'), ['a="x\ty"', "b=1"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// PIPES & PARAMS
// ═══════════════════════════════════════════════════════════════════════════

section("Pipe Splitting");

test("body and pipe", () => {
  assert.deepEqual(splitPipe("i.result | summary"), { body: "i.result", pipe: "summary" });
});

test("no pipe", () => {
  assert.deepEqual(splitPipe("date minus=1d"), { body: "date minus=1d" });
});

test("empty pipe name means no pipe", () => {
  assert.deepEqual(splitPipe("date |"), { body: "date" });
});

test("no whitespace around bar", () => {
  assert.deepEqual(splitPipe("i.result|summary"), { body: "i.result", pipe: "summary" });
});

test("only the first bar splits", () => {
  assert.deepEqual(splitPipe("result | a | b"), { body: "result", pipe: "a | b" });
});

section("Param Parsing");

test("equals separator", () => {
  assert.deepEqual(parseParam("minus=1d"), ["minus", "1d"]);
});

test("colon separator", () => {
  assert.deepEqual(parseParam("limit:3"), ["limit", "3"]);
});

test("equals wins over an earlier colon", () => {
  assert.deepEqual(parseParam("key=val:ue"), ["key", "val:ue"]);
  assert.deepEqual(parseParam("a:b=c"), ["a:b", "c"]);
});

test("empty value after equals", () => {
  assert.deepEqual(parseParam("key="), ["key", ""]);
});

test("empty value after colon", () => {
  assert.deepEqual(parseParam("key:"), ["key", ""]);
});

test("empty key", () => {
  assertTemplateError(
    () => parseParam("=value"),
    "InvalidParam",
    "empty parameter key in '=value'"
  );
});

test("no separator", () => {
  assertTemplateError(
    () => parseParam("nosep"),
    "InvalidParam",
    "invalid parameter (missing '=' or ':'): 'nosep'"
  );
});

test("repeated key keeps the last value", () => {
  const tag = parseTag("date minus=1d minus=2d");
  assert.equal(tag.params.get("minus"), "2d");
  assert.equal(tag.params.size, 1);
});

test("name may contain colons and dots", () => {
  assert.equal(parseTag("custom:first.name").name, "custom:first.name");
});

// ═══════════════════════════════════════════════════════════════════════════
// FOR-LOOP HEADERS
// ═══════════════════════════════════════════════════════════════════════════

section("For-Loop Headers");

test("negative range", () => {
  assert.deepEqual(parseForLoop("i in (-3..-1)").iterable, { kind: "range", start: -3, end: -1 });
});

test("single-element range", () => {
  assert.deepEqual(parseForLoop("i in (5..5)").iterable, { kind: "range", start: 5, end: 5 });
});

test("spaces inside range bounds are trimmed", () => {
  assert.deepEqual(parseForLoop("i in ( 1 .. 4 )").iterable, { kind: "range", start: 1, end: 4 });
});

test("reversed range parses", () => {
  assert.deepEqual(parseForLoop("i in (3..1)").iterable, { kind: "range", start: 3, end: 1 });
});

test("range ignores trailing text after the paren", () => {
  const loop = parseForLoop("i in (1..2) limit:1");
  assert.deepEqual(loop.iterable, { kind: "range", start: 1, end: 2 });
  assert.equal(loop.params.size, 0);
});

test("unknown collection names parse", () => {
  assert.deepEqual(parseForLoop("x in foobar").iterable, { kind: "collection", name: "foobar" });
});

test("collection with quoted param", () => {
  const loop = parseForLoop('m in memories note="a b" limit=2');
  assert.equal(loop.params.get("note"), '"a b"');
  assert.equal(loop.params.get("limit"), "2");
});

test("keyword other than 'in'", () => {
  assertTemplateError(
    () => tokenize("{% for i of (1..3) %}"),
    "InvalidForLoopSyntax",
    "invalid for loop syntax: 'for i of (1..3)'"
  );
});

test("unclosed range", () => {
  assertTemplateError(
    () => tokenize("{% for i in (1..3 %}"),
    "UnclosedRangeParen",
    "unclosed range parenthesis"
  );
});

test("invalid range start", () => {
  assertTemplateError(
    () => tokenize("{% for i in (abc..3) %}"),
    "InvalidRangeBound",
    "invalid range start: 'abc'"
  );
});

test("invalid range end", () => {
  assertTemplateError(
    () => tokenize("{% for i in (1..abc) %}"),
    "InvalidRangeBound",
    "invalid range end: 'abc'"
  );
});

test("fractional bound", () => {
  assertTemplateError(
    () => parseForLoop("i in (1.5..3)"),
    "InvalidRangeBound",
    "invalid range start: '1.5'"
  );
});

test("bound beyond safe integers", () => {
  assertTemplateError(
    () => parseForLoop("i in (1..9007199254740993)"),
    "InvalidRangeBound",
    "invalid range end: '9007199254740993'"
  );
});

test("range with three pieces", () => {
  assertTemplateError(
    () => parseForLoop("i in (1..2..3)"),
    "InvalidRangeBound",
    "invalid range syntax: '1..2..3'"
  );
});

test("range without separator", () => {
  assertTemplateError(
    () => parseForLoop("i in (5)"),
    "InvalidRangeBound",
    "invalid range syntax: '5'"
  );
});

test("invalid loop param", () => {
  assertTemplateError(
    () => parseForLoop("m in memories three"),
    "InvalidParam",
    "invalid parameter (missing '=' or ':'): 'three'"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// BLOCK MATCHING
// ═══════════════════════════════════════════════════════════════════════════

section("Block Matching");

test("finds the endfor at depth zero", () => {
  const tokens = tokenize("a{% endfor %}b");
  const { body, endIndex } = collectForBody(tokens);
  assert.deepEqual(body, [{ kind: "literal", text: "a" }]);
  assert.equal(endIndex, 1);
});

test("nested blocks stay inside the body", () => {
  // tokens after the outer for-start
  const tokens = tokenize("{% for j in (1..2) %}x{% endfor %}y{% endfor %}z");
  const { body, endIndex } = collectForBody(tokens);
  assert.equal(body.length, 4);
  assert.deepEqual(body[2], { kind: "forEnd" });
  assert.deepEqual(body[3], { kind: "literal", text: "y" });
  assert.equal(endIndex, 4);
});

test("empty body", () => {
  const { body, endIndex } = collectForBody(tokenize("{% endfor %}"));
  assert.deepEqual(body, []);
  assert.equal(endIndex, 0);
});

test("missing endfor", () => {
  assertTemplateError(
    () => collectForBody(tokenize("hello")),
    "UnterminatedForLoop",
    "for loop without matching endfor"
  );
});

test("inner endfor does not close the outer block", () => {
  assertTemplateError(
    () => collectForBody(tokenize("{% for j in (1..2) %}{% endfor %}")),
    "UnterminatedForLoop",
    "for loop without matching endfor"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
