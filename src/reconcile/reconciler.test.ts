import { ABSENT, batteryAnnotation, formatReported, reconcile } from "./reconciler";

const SCHEDULE = "00:00/19 05:00/21 09:30/21 14:00/21 18:30/21 23:00/19";

const expected = {
  temperature_sensitivity: 0.5,
  system_mode: "heat",
  preset: "schedule",
  schedule_monday: SCHEDULE,
  schedule_sunday: SCHEDULE,
};

describe("reconcile", () => {
  it("should report nothing when the device echoes the payload", () => {
    expect(reconcile(expected, { ...expected })).toEqual([]);
  });

  it("should ignore keys only the device reports", () => {
    expect(
      reconcile(expected, { ...expected, local_temperature: 20.5, battery: 90 })
    ).toEqual([]);
  });

  it("should compare numbers with a small tolerance", () => {
    expect(reconcile({ t: 21.0 }, { t: "21.0000005" })).toEqual([]);
    expect(reconcile({ t: 21.0 }, { t: 22.0 })).toEqual([
      { key: "t", expected: 21, reported: 22 },
    ]);
    expect(reconcile({ t: 0.5 }, { t: "0.5" })).toEqual([]);
  });

  it("should compare schedule temperatures in canonical form", () => {
    expect(reconcile({ s: "06:00/21.0" }, { s: "06:00/21" })).toEqual([]);
    expect(
      reconcile({ s: "06:00/21 22:00/19" }, { s: "06:00/21.00  22:00/19.0" })
    ).toEqual([]);
    expect(reconcile({ s: "06:00/21" }, { s: "06:30/21" })).toEqual([
      { key: "s", expected: "06:00/21", reported: "06:30/21" },
    ]);
  });

  it("should flag schedules with a different number of entries", () => {
    expect(reconcile({ s: "06:00/21 22:00/19" }, { s: "06:00/21" })).toEqual([
      { key: "s", expected: "06:00/21 22:00/19", reported: "06:00/21" },
    ]);
  });

  it("should collapse whitespace when comparing text", () => {
    expect(reconcile({ m: "heat  mode" }, { m: " heat mode " })).toEqual([]);
    expect(reconcile({ m: "heat" }, { m: "auto" })).toEqual([
      { key: "m", expected: "heat", reported: "auto" },
    ]);
  });

  it("should use strict equality for other values", () => {
    expect(reconcile({ on: true }, { on: true })).toEqual([]);
    expect(reconcile({ on: true }, { on: "true" })).toEqual([
      { key: "on", expected: true, reported: "true" },
    ]);
    expect(reconcile({ v: null }, { v: null })).toEqual([]);
  });

  it("should mark missing keys as absent", () => {
    expect(reconcile({ system_mode: "heat", preset: "schedule" }, { preset: "schedule" })).toEqual([
      { key: "system_mode", expected: "heat", reported: ABSENT },
    ]);
  });

  it("should mark every key absent when the state is not an object", () => {
    const want = [
      { key: "a", expected: 1, reported: ABSENT },
      { key: "b", expected: "x", reported: ABSENT },
    ];
    expect(reconcile({ b: "x", a: 1 }, "not json")).toEqual(want);
    expect(reconcile({ b: "x", a: 1 }, null)).toEqual(want);
    expect(reconcile({ b: "x", a: 1 }, [1, 2])).toEqual(want);
  });

  it("should sort the report by key", () => {
    const report = reconcile({ zeta: 1, alpha: 2, mid: 3 }, {});
    expect(report.map((m) => m.key)).toEqual(["alpha", "mid", "zeta"]);
  });
});

describe("formatReported", () => {
  it("should render absent and JSON values", () => {
    expect(formatReported(ABSENT)).toBe("<absent>");
    expect(formatReported("heat")).toBe('"heat"');
    expect(formatReported(21)).toBe("21");
  });
});

describe("batteryAnnotation", () => {
  it("should prefer the low battery flag", () => {
    expect(batteryAnnotation({ battery_low: true, battery: 80 })).toBe(
      "battery low"
    );
  });

  it("should report a level below the threshold", () => {
    expect(batteryAnnotation({ battery: 15 })).toBe("battery 15%");
    expect(batteryAnnotation({ battery_low: false, battery: 5 })).toBe(
      "battery 5%"
    );
    expect(batteryAnnotation({ battery: 15 }, 10)).toBeNull();
    expect(batteryAnnotation({ battery: 20 })).toBeNull();
  });

  it("should say nothing when the battery is fine", () => {
    expect(batteryAnnotation({ battery_low: false })).toBeNull();
    expect(batteryAnnotation({ battery: 85 })).toBeNull();
  });

  it("should flag missing battery information", () => {
    expect(batteryAnnotation({ system_mode: "heat" })).toBe("battery unknown");
    expect(batteryAnnotation("raw text")).toBe("battery unknown");
    expect(batteryAnnotation(null)).toBe("battery unknown");
  });
});
