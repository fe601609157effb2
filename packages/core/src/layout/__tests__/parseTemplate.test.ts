import { assert, describe, test } from "@gridwork/testkit";
import { parseAutoTrackList, parseTrackList } from "../grid/parseTemplate.js";
import {
  AUTO_FILL,
  AUTO_FIT,
  auto,
  fitContent,
  fr,
  length,
  maxContent,
  minContent,
  minmax,
  percent,
  repeat,
} from "../grid/trackSizing.js";
import { lengthValue, percentValue } from "../style/dimension.js";

function mustParse(raw: string) {
  const res = parseTrackList("templateColumns", raw);
  assert.equal(res.ok, true, `parse should succeed for "${raw}"`);
  if (!res.ok) throw new Error("parse failed");
  return res.value;
}

function parseError(raw: string): string {
  const res = parseTrackList("templateColumns", raw);
  assert.equal(res.ok, false, `parse should fail for "${raw}"`);
  if (res.ok) throw new Error("parse succeeded");
  assert.equal(res.fatal.code, "GRID_INVALID_PROPS");
  return res.fatal.detail;
}

describe("parseTrackList", () => {
  test("lengths, percentages and flex factors", () => {
    assert.deepEqual(mustParse("100 40px 25% 2fr fr"), [
      length(100),
      length(40),
      percent(0.25),
      fr(2),
      fr(1),
    ]);
  });

  test("keywords and functions", () => {
    assert.deepEqual(mustParse("auto min-content max-content fit-content(40px)"), [
      auto(),
      minContent(),
      maxContent(),
      fitContent(lengthValue(40)),
    ]);
  });

  test("minmax keeps separate min and max functions", () => {
    assert.deepEqual(mustParse("minmax(100px, 2fr) minmax(auto,50%)"), [
      minmax(lengthValue(100), { kind: "fr", flex: 2 }),
      minmax({ kind: "auto" }, percentValue(0.5)),
    ]);
  });

  test("repeat with a count and with auto-fill / auto-fit", () => {
    assert.deepEqual(mustParse("20 repeat(3, 10 1fr) repeat(auto-fill, 40px 50%)"), [
      length(20),
      repeat(3, [length(10), fr(1)]),
      repeat(AUTO_FILL, [length(40), percent(0.5)]),
    ]);
    assert.deepEqual(mustParse("repeat(auto-fit, minmax(20px, 1fr))"), [
      repeat(AUTO_FIT, [minmax(lengthValue(20), { kind: "fr", flex: 1 })]),
    ]);
  });

  test("top-level commas separate tokens and case is ignored", () => {
    assert.deepEqual(mustParse(" 10PX, 2FR ,Auto "), [length(10), fr(2), auto()]);
  });

  test("rejects empty input", () => {
    assert.equal(parseError("   "), "grid.templateColumns must be a non-empty track string");
  });

  test("rejects unknown tokens", () => {
    assert.equal(
      parseError("10 bogus"),
      'grid.templateColumns track token "bogus" must be "auto", "min-content", "max-content", ' +
        '"<n>", "<n>px", "<n>%", "<n>fr", "minmax(<min>, <max>)" or "fit-content(<n>)"',
    );
  });

  test("rejects negative and zero flex values", () => {
    assert.match(parseError("0fr"), /^grid\.templateColumns track token "0fr"/);
    assert.match(parseError("-10"), /^grid\.templateColumns track token "-10"/);
  });

  test("rejects a flexible minimum", () => {
    assert.equal(
      parseError("minmax(1fr, 10)"),
      'grid.templateColumns "minmax(1fr, 10)" minimum must be ' +
        '"auto", "min-content", "max-content", "<n>" or "<n>%"',
    );
  });

  test("rejects minmax with the wrong argument count", () => {
    assert.equal(
      parseError("minmax(10)"),
      'grid.templateColumns "minmax(10)" must take exactly two arguments',
    );
  });

  test("rejects invalid repeat counts", () => {
    assert.equal(
      parseError("repeat(0, 10)"),
      'grid.templateColumns repeat count "0" must be an integer from 1 to 65535, ' +
        '"auto-fill" or "auto-fit"',
    );
  });

  test("repeat counts are limited to 65535", () => {
    assert.deepEqual(mustParse("repeat(65535, 10)"), [repeat(65535, [length(10)])]);
    assert.equal(
      parseError("repeat(65536, 10)"),
      'grid.templateColumns repeat count "65536" must be an integer from 1 to 65535, ' +
        '"auto-fill" or "auto-fit"',
    );
    assert.match(parseError("repeat(2147483647, 10)"), /repeat count "2147483647"/);
  });

  test("rejects nested repeats", () => {
    assert.equal(
      parseError("repeat(2, repeat(2, 10))"),
      "grid.templateColumns does not allow repeat() here",
    );
  });

  test("rejects a repeat without tracks", () => {
    assert.equal(
      parseError("repeat(auto-fill, )"),
      'grid.templateColumns "repeat(auto-fill, )" must repeat at least one track',
    );
  });

  test("rejects unbalanced parentheses", () => {
    assert.equal(parseError("10 (20"), "grid.templateColumns has unbalanced parentheses");
    assert.equal(parseError("10 20)"), "grid.templateColumns has unbalanced parentheses");
  });
});

describe("parseAutoTrackList", () => {
  test("parses single tracks", () => {
    const res = parseAutoTrackList("autoRows", "auto 100px");
    assert.deepEqual(res, { ok: true, value: [auto(), length(100)] });
  });

  test("does not allow repeat()", () => {
    const res = parseAutoTrackList("autoRows", "repeat(2, 10)");
    assert.deepEqual(res, {
      ok: false,
      fatal: { code: "GRID_INVALID_PROPS", detail: "grid.autoRows does not allow repeat() here" },
    });
  });
});
