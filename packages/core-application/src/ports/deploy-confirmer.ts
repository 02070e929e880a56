import type { DeployPlan } from "../value-objects/deploy-plan";

export interface DeployConfirmer {
  confirmDeploy(plan: DeployPlan): Promise<boolean>;
}
