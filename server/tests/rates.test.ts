import { describe, it, expect } from "@jest/globals";
import { convertToSqft, estimateCost, formatRupees, lookupRate } from "../src/services/rates";

describe("convertToSqft", () => {
  it("truncates after converting", () => {
    expect(convertToSqft(1200, "sqft")).toBe(1200);
    expect(convertToSqft(100, "sqm")).toBe(1076);
    expect(convertToSqft(2, "cent")).toBe(871);
  });
});

describe("lookupRate", () => {
  it("uses the truncated midpoint of the district range", () => {
    expect(lookupRate("641035")).toEqual({ rate: 7000, district: "Coimbatore" });
    expect(lookupRate("613001")).toEqual({ rate: 1650, district: "Thanjavur" });
  });

  it("expands numbered pincode ranges", () => {
    expect(lookupRate("600001")).toEqual({ rate: 15000, district: "Chennai" });
    expect(lookupRate("600099")).toEqual({ rate: 15000, district: "Chennai" });
    expect(lookupRate("6000100")).toEqual({ rate: 15000, district: "Chennai" });
    expect(lookupRate("625020")).toEqual({ rate: 3600, district: "Madurai" });
    expect(lookupRate("641601")).toEqual({ rate: 3600, district: "Tiruppur" });
  });

  it("falls back to the default rate for unknown pincodes", () => {
    expect(lookupRate("999999")).toEqual({ rate: 1500, district: "Unknown" });
    expect(lookupRate("625021")).toEqual({ rate: 1500, district: "Unknown" });
    expect(lookupRate("600100")).toEqual({ rate: 1500, district: "Unknown" });
  });
});

describe("estimateCost", () => {
  it("multiplies area by rate and formats rupees", () => {
    expect(estimateCost({ plotSize: 1200, unit: "sqft", pincode: "638001" })).toEqual({
      sqft: 1200,
      rate: 1900,
      costEstimate: 2280000,
      formattedCost: "₹2,280,000",
      district: "Erode",
    });
  });

  it("formats with thousands separators", () => {
    expect(formatRupees(999)).toBe("₹999");
    expect(formatRupees(1500000)).toBe("₹1,500,000");
  });
});
