import { z } from "zod";

/** Any code is accepted; ones outside the district table price at the default rate */
const pincodeSchema = z.string().trim().min(1, "pincode is required").default("641035");

/** Validates the body of POST /rates/calculate */
export const calculateRateSchema = z.object({
  plotSize: z.coerce.number().positive().default(1000),
  unit: z.enum(["sqft", "sqm", "cent"]).default("sqft"),
  pincode: pincodeSchema,
});

/** Validates the body of POST /chat/init */
export const initChatSchema = z.object({
  bhk: z.coerce.number().int().min(1).default(2),
  sqft: z.coerce.number().int().positive().default(1000),
  facing: z.string().min(1).default("East"),
  style: z.string().min(1).default("Modern"),
  pincode: pincodeSchema,
});

/** Validates the body of POST /chat/message */
export const chatMessageSchema = z.object({
  sessionId: z.string().min(1, "sessionId is required"),
  message: z.string().min(1, "message is required").max(2000),
});

/** Validates the body of POST /plans/generate */
export const generateSchema = z.object({
  sessionId: z.string().min(1, "sessionId is required"),
});

/** Validates :id route params */
export const requestIdSchema = z.object({
  id: z.string().min(1),
});
