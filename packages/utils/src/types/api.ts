import { z } from "zod";
import { OUTPUT_FORMATS } from "../constants.js";

export const extractQuerySchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default("text"),
});

export type ExtractQueryInput = z.infer<typeof extractQuerySchema>;

export interface ApiErrorResponse {
  error: string;
  code: string;
  details?: Record<string, string[]>;
}
