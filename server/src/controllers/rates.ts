import { Request, Response, NextFunction } from "express";
import { calculateRateSchema } from "../validation/house";
import { estimateCost } from "../services/rates";
import { log } from "../utils/logger";

// POST /rates/calculate — area in any unit → sqft, rate and cost
export function calculateRate(req: Request, res: Response, next: NextFunction): void {
  try {
    const body = calculateRateSchema.parse(req.body ?? {});
    const estimate = estimateCost(body);
    log.rate(`${body.pincode} → ${estimate.district} @ ${estimate.rate}/sqft`);
    res.json({ success: true, data: estimate });
  } catch (err) {
    next(err);
  }
}
