import { NotFoundError } from "../errors";
import { loadPlans, type Plan } from "../data/loaders/reference";

export type { Plan, PlanType } from "../data/loaders/reference";

export function listPlans(): Plan[] {
  return loadPlans();
}

export function getPlan(code: string): Plan {
  const plan = loadPlans().find((p) => p.code === code);
  if (!plan) {
    throw new NotFoundError(`Unknown plan: ${code}. Available: ${loadPlans().map((p) => p.code).join(", ")}`);
  }
  return plan;
}
