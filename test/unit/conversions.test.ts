import assert from "node:assert/strict";
import test from "node:test";

import {
  decodeTimeOfDay,
  kelvinToCelsius,
  localIsoDate,
  relativeHumidity,
  shiftIsoDate,
  windMagnitudeToKmh
} from "../../src/modules/alert-engine/conversions.js";
import { assertClose } from "../support/fixtures.js";

test("kelvinToCelsius subtracts 273.15", () => {
  for (const kelvin of [0, 233.15, 273.15, 300, 310.4, 1_000]) {
    assert.equal(kelvinToCelsius(kelvin), kelvin - 273.15);
  }
});

test("relativeHumidity is 100 when temperature equals dew point", () => {
  for (const celsius of [-30, 0, 12.5, 25, 40]) {
    assertClose(relativeHumidity(celsius, celsius), 100, 1e-9);
  }
});

test("relativeHumidity follows Magnus-Tetens for a dry afternoon", () => {
  assertClose(relativeHumidity(25, 15.32), 55.00006345, 1e-6);
  assertClose(relativeHumidity(30, 10), 28.99168712, 1e-6);
});

test("relativeHumidity stays within 0..100 for extreme inputs", () => {
  const pairs: Array<[number, number]> = [
    [-50, 40],
    [40, -50],
    [-237.6, 10],
    [-237.8, 10],
    [10, -237.6],
    [1e6, -1e6],
    [-1e6, 1e6]
  ];
  for (const [temperature, dewPoint] of pairs) {
    const humidity = relativeHumidity(temperature, dewPoint);
    assert.ok(humidity >= 0 && humidity <= 100, `${temperature}/${dewPoint} gave ${humidity}`);
  }
});

test("relativeHumidity yields 100 at the Magnus singularity", () => {
  assert.equal(relativeHumidity(-237.7, -237.7), 100);
});

test("windMagnitudeToKmh converts squared speed to km/h", () => {
  assert.equal(windMagnitudeToKmh(0), 0);
  assertClose(windMagnitudeToKmh(18), 15.273506473629425, 1e-9);
  assertClose(windMagnitudeToKmh(100), 36, 1e-9);
});

test("windMagnitudeToKmh is undefined for negative or missing input", () => {
  assert.equal(windMagnitudeToKmh(-1), undefined);
  assert.equal(windMagnitudeToKmh(undefined), undefined);
  assert.equal(windMagnitudeToKmh(Number.NaN), undefined);
});

test("windMagnitudeToKmh increases with its input", () => {
  const inputs = [0, 0.5, 1, 4, 11.08, 18, 50, 400];
  const outputs = inputs.map((input) => windMagnitudeToKmh(input) ?? Number.NaN);
  for (let index = 1; index < outputs.length; index += 1) {
    const previous = outputs[index - 1] ?? Number.NaN;
    const current = outputs[index] ?? Number.NaN;
    assert.ok(current > previous, `${current} should exceed ${previous}`);
  }
});

test("decodeTimeOfDay moves midnight UTC to 21:00 of the previous day", () => {
  assert.deepEqual(decodeTimeOfDay(0, "2026-10-19"), {
    hour: 21,
    minute: 0,
    day: 18,
    date: "2026-10-18",
    formatted: "21:00"
  });
});

test("decodeTimeOfDay keeps the reference day inside the local day", () => {
  assert.deepEqual(decodeTimeOfDay(10_800, "2026-10-19"), {
    hour: 0,
    minute: 0,
    day: 19,
    date: "2026-10-19",
    formatted: "00:00"
  });
  assert.deepEqual(decodeTimeOfDay(86_399, "2026-10-19"), {
    hour: 20,
    minute: 59,
    day: 19,
    date: "2026-10-19",
    formatted: "20:59"
  });
  assert.deepEqual(decodeTimeOfDay(90_000, "2026-10-19"), {
    hour: 22,
    minute: 0,
    day: 19,
    date: "2026-10-19",
    formatted: "22:00"
  });
});

test("decodeTimeOfDay moves past local midnight to the next day", () => {
  assert.deepEqual(decodeTimeOfDay(100_800, "2026-10-19"), {
    hour: 1,
    minute: 0,
    day: 20,
    date: "2026-10-20",
    formatted: "01:00"
  });
  assert.equal(decodeTimeOfDay(97_200, "2026-10-19").date, "2026-10-20");
  assert.equal(decodeTimeOfDay(97_199, "2026-10-19").formatted, "23:59");
});

test("decodeTimeOfDay crosses month and year boundaries", () => {
  assert.equal(decodeTimeOfDay(0, "2026-11-01").date, "2026-10-31");
  assert.equal(decodeTimeOfDay(0, "2026-03-01").date, "2026-02-28");
  assert.equal(decodeTimeOfDay(100_800, "2026-12-31").date, "2027-01-01");
});

test("decodeTimeOfDay honours a custom offset and truncates fractional seconds", () => {
  const decoded = decodeTimeOfDay(3_661.9, "2026-10-19", 0);
  assert.equal(decoded.formatted, "01:01");
  assert.equal(decoded.date, "2026-10-19");
});

test("shiftIsoDate rejects malformed dates", () => {
  assert.throws(() => shiftIsoDate("2026-02-30", 1), /not an ISO calendar date/);
  assert.throws(() => shiftIsoDate("19/10/2026", 1), /not an ISO calendar date/);
  assert.equal(shiftIsoDate("2024-02-28", 1), "2024-02-29");
});

test("localIsoDate applies the local offset", () => {
  assert.equal(localIsoDate(new Date("2026-10-19T02:59:59.000Z")), "2026-10-18");
  assert.equal(localIsoDate(new Date("2026-10-19T03:00:00.000Z")), "2026-10-19");
  assert.equal(localIsoDate(new Date("2026-10-19T02:00:00.000Z"), 0), "2026-10-19");
});
