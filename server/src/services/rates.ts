import { z } from "zod";
import districtData from "../../data/districts.json";

// ---------------------------------------------------------------------------
// District rate table — loaded once, pincode sets expanded up front
// ---------------------------------------------------------------------------

const pincodeRangeSchema = z.object({
  prefix: z.string(),
  from: z.number().int(),
  to: z.number().int(),
  width: z.number().int().positive(),
});

const districtSchema = z.object({
  name: z.string().min(1),
  rateRange: z.tuple([z.number().positive(), z.number().positive()]),
  pincodes: z.array(z.string()).default([]),
  pincodeRanges: z.array(pincodeRangeSchema).default([]),
});

const rateTableSchema = z.object({
  defaultRate: z.number().positive(),
  districts: z.array(districtSchema),
});

interface District {
  name: string;
  rateRange: [number, number];
  pincodes: ReadonlySet<string>;
}

const table = rateTableSchema.parse(districtData);

export const DEFAULT_RATE = table.defaultRate;
export const UNKNOWN_DISTRICT = "Unknown";

const DISTRICTS: readonly District[] = table.districts.map((d) => {
  const codes = new Set(d.pincodes);
  for (const r of d.pincodeRanges) {
    for (let i = r.from; i <= r.to; i++) {
      codes.add(`${r.prefix}${String(i).padStart(r.width, "0")}`);
    }
  }
  return { name: d.name, rateRange: d.rateRange, pincodes: codes };
});

// ---------------------------------------------------------------------------
// Lookup & estimate
// ---------------------------------------------------------------------------

export type AreaUnit = "sqft" | "sqm" | "cent";

const SQFT_PER_UNIT: Record<AreaUnit, number> = {
  sqft: 1,
  sqm: 10.764,
  cent: 435.6,
};

export function convertToSqft(plotSize: number, unit: AreaUnit): number {
  return Math.trunc(plotSize * SQFT_PER_UNIT[unit]);
}

/** Rate per sqft is the midpoint of the first district listing the pincode. */
export function lookupRate(pincode: string): { rate: number; district: string } {
  const district = DISTRICTS.find((d) => d.pincodes.has(pincode));
  if (!district) return { rate: DEFAULT_RATE, district: UNKNOWN_DISTRICT };
  const [min, max] = district.rateRange;
  return { rate: Math.trunc((min + max) / 2), district: district.name };
}

export interface CostEstimate {
  sqft: number;
  rate: number;
  costEstimate: number;
  formattedCost: string;
  district: string;
}

export function formatRupees(amount: number): string {
  return `₹${amount.toLocaleString("en-US")}`;
}

export function estimateCost(params: { plotSize: number; unit: AreaUnit; pincode: string }): CostEstimate {
  const sqft = convertToSqft(params.plotSize, params.unit);
  const { rate, district } = lookupRate(params.pincode);
  const costEstimate = sqft * rate;
  return { sqft, rate, costEstimate, formattedCost: formatRupees(costEstimate), district };
}
