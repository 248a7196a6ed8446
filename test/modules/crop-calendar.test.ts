import assert from "node:assert/strict";
import test from "node:test";

import {
  CROP_CALENDAR,
  Seasons,
  getCropDefinition,
  listSeasonalCrops,
  parseCropCalendar
} from "../../src/modules/crop-calendar/index.js";
import { InvalidCropDefinitionError } from "../../src/modules/shared/errors.js";

function calendarWith(crop: Record<string, unknown>): unknown {
  return {
    crops: [
      {
        name: "testcrop",
        season: "Rabi",
        sowingSeasons: ["Rabi"],
        nominalDurationDays: 100,
        stages: ["Sowing", "Harvesting"],
        ...crop
      }
    ]
  };
}

test("bundled calendar loads every crop", () => {
  assert.equal(CROP_CALENDAR.crops.size, 20);

  const rice = getCropDefinition(" Rice ");
  assert.equal(rice?.name, "rice");
  assert.equal(rice?.season, "Kharif");
  assert.equal(rice?.nominalDurationDays, 120);
  assert.equal(rice?.stages.length, 9);
  assert.equal(Object.isFrozen(rice), true);
});

test("seasonal crop lists follow the sowing seasons", () => {
  assert.deepEqual(listSeasonalCrops(Seasons.ZAID), [
    "maize",
    "moong",
    "urd",
    "watermelon",
    "cucumber"
  ]);
  assert.equal(listSeasonalCrops(Seasons.KHARIF).includes("sugarcane"), false);
  assert.equal(listSeasonalCrops(Seasons.RABI).includes("sugarcane"), false);
});

test("rejects crops with an unknown season", () => {
  assert.throws(
    () => parseCropCalendar(calendarWith({ season: "Monsoon" })),
    InvalidCropDefinitionError
  );
});

test("rejects crops without stages", () => {
  assert.throws(
    () => parseCropCalendar(calendarWith({ stages: [] })),
    /Crop "testcrop" has an invalid definition: stages must not be empty/
  );
});

test("rejects crops with more stages than days", () => {
  assert.throws(
    () => parseCropCalendar(calendarWith({ nominalDurationDays: 1 })),
    /Crop "testcrop" has an invalid definition: 2 stages cannot fit in 1 days/
  );
});
