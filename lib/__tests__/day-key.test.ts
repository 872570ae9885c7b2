import { addDays, dayKey, daysBetween, enumerateDays, isDayKey } from "../day-key";

describe("isDayKey", () => {
  it("accepts real calendar days", () => {
    expect(isDayKey("2025-06-10")).toBe(true);
    expect(isDayKey("2024-02-29")).toBe(true);
  });
  it("rejects impossible or malformed days", () => {
    expect(isDayKey("2025-02-29")).toBe(false);
    expect(isDayKey("2025-6-10")).toBe(false);
    expect(isDayKey("")).toBe(false);
  });
});

describe("addDays / daysBetween", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28");
  });
  it("counts whole days between keys", () => {
    expect(daysBetween("2025-06-10", "2025-06-14")).toBe(4);
    expect(daysBetween("2025-06-14", "2025-06-10")).toBe(-4);
  });
});

describe("enumerateDays", () => {
  it("includes both ends in ascending order", () => {
    expect(enumerateDays("2025-06-29", "2025-07-01")).toEqual(["2025-06-29", "2025-06-30", "2025-07-01"]);
  });
  it("returns a single day when from equals to", () => {
    expect(enumerateDays("2025-06-10", "2025-06-10")).toEqual(["2025-06-10"]);
  });
  it("returns nothing for reversed or invalid ranges", () => {
    expect(enumerateDays("2025-06-12", "2025-06-10")).toEqual([]);
    expect(enumerateDays("bad", "2025-06-10")).toEqual([]);
  });
});

describe("dayKey", () => {
  it("uses the host calendar without a zone", () => {
    expect(dayKey(new Date("2025-06-10T08:00:00"))).toBe("2025-06-10");
  });
  it("buckets by the requested zone", () => {
    const instant = new Date("2025-06-10T23:30:00Z");
    expect(dayKey(instant, "America/New_York")).toBe("2025-06-10");
    expect(dayKey(instant, "Asia/Tokyo")).toBe("2025-06-11");
  });
  it("falls back to the host calendar for an unknown zone", () => {
    const instant = new Date("2025-06-10T12:00:00");
    expect(dayKey(instant, "Not/AZone")).toBe(dayKey(instant));
  });
});
