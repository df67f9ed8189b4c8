import type { PlanResult } from "../../services/planner/types.js";

export type PlanResponse =
  | { success: true; plan: PlanResult }
  | { success: false; error: string; plan?: PlanResult };

export interface HealthResponse {
  status: "healthy";
  service: string;
}
