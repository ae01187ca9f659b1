import { expect, test } from "vitest";
import { formatTimecode, parseTimecode } from "../../utils/timecode.js";

test.each([
  ["01:15", 75],
  ["1:02:03", 3723],
  ["[12:30]", 750],
  [" 42 ", 42],
  ["12.5", 12.5],
  ["[MM:SS]", null],
  ["", null],
  ["1:2:3:4", null],
  ["ten", null],
])("parseTimecode(%j) is %j", (value, expected) => {
  expect(parseTimecode(value)).toBe(expected);
});

test("parseTimecode accepts missing values", () => {
  expect(parseTimecode(undefined)).toBeNull();
  expect(parseTimecode(null)).toBeNull();
});

test("formatTimecode pads minutes and seconds and adds hours when needed", () => {
  expect(formatTimecode(75)).toBe("01:15");
  expect(formatTimecode(3723.9)).toBe("1:02:03");
  expect(formatTimecode(-5)).toBe("00:00");
});
