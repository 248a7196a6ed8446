import assert from "node:assert/strict";
import test from "node:test";

import { Seasons } from "../../src/modules/crop-calendar/constants.js";
import { classifySeason, monthInIndia, parseSeason } from "../../src/modules/crop-calendar/season.js";

test("monsoon months map to Kharif", () => {
  for (const month of [6, 7, 8, 9]) {
    assert.equal(classifySeason(month), Seasons.KHARIF);
  }
});

test("April and May map to Zaid", () => {
  assert.equal(classifySeason(4), Seasons.ZAID);
  assert.equal(classifySeason(5), Seasons.ZAID);
});

test("October through March map to Rabi", () => {
  for (const month of [10, 11, 12, 1, 2, 3]) {
    assert.equal(classifySeason(month), Seasons.RABI);
  }
});

test("months outside 1-12 are rejected", () => {
  assert.throws(() => classifySeason(0), RangeError);
  assert.throws(() => classifySeason(13), RangeError);
  assert.throws(() => classifySeason(6.5), /month must be an integer between 1 and 12, got 6.5/);
});

test("parses season names case-insensitively", () => {
  assert.equal(parseSeason(" kharif "), Seasons.KHARIF);
  assert.equal(parseSeason("RABI"), Seasons.RABI);
  assert.equal(parseSeason("monsoon"), undefined);
});

test("the month follows India Standard Time at month boundaries", () => {
  assert.equal(monthInIndia(new Date("2025-05-31T18:29:59Z")), 5);
  assert.equal(monthInIndia(new Date("2025-05-31T18:30:00Z")), 6);
  assert.equal(classifySeason(monthInIndia(new Date("2025-05-31T20:00:00Z"))), Seasons.KHARIF);
  assert.equal(monthInIndia(new Date("2025-12-31T19:00:00Z")), 1);
});
