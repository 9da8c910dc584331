import { z } from "zod";
import {
  COMMUNICATION_METHODS,
  DESTINATIONS,
  LAUNCH_LOCATIONS,
  LEAD_SOURCES,
} from "../constants/scoring.constants";

export const customerProfileSchema = z.object({
  communicationMethod: z.enum(COMMUNICATION_METHODS),
  leadSource: z.enum(LEAD_SOURCES),
  destination: z.enum(DESTINATIONS),
  launchLocation: z.enum(LAUNCH_LOCATIONS),
  customerName: z.string().trim().min(1, "Customer name is required"),
});

export const rankingQuerySchema = z.object({
  regime: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export type RankingQuery = z.infer<typeof rankingQuerySchema>;
